// =============================================================================
// Limits
// =============================================================================

/** Maximum entries returned by a single directory listing */
export const MAX_DIR_ENTRIES = 1000;

/** Maximum nodes emitted by a directory tree */
export const MAX_TREE_NODES = 1000;

/** Default cap on search matches */
export const DEFAULT_SEARCH_RESULTS = 50;

/** Hard cap on search matches, whatever the caller asks for */
export const MAX_SEARCH_RESULTS = 200;

/** Binary detection sample size */
export const BINARY_CHECK_SIZE = 8192;

/** Characters of edit text quoted back in match errors */
export const EDIT_PREVIEW_LENGTH = 80;
