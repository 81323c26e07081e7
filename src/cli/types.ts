/**
 * CLI type definitions.
 */

/**
 * Flags parsed from the command line. These map to meow options in src/cli/args.ts.
 * Absent flags stay undefined so environment values can apply.
 */
export interface CLIFlags {
  /** Enable write_file, edit_file, create_directory */
  allowWrite?: boolean;
  /** Enable delete and move tools (implies allowWrite) */
  allowDestructive?: boolean;
  /** Largest file read whole, in bytes */
  maxReadSize?: number;
  /** Deepest level directory_tree and search_files descend to */
  maxDepth?: number;
  /** debug | info | warn | error */
  logLevel?: string;
  /** pretty | json */
  logFormat?: string;
}

/**
 * Result of command-line parsing.
 */
export interface ParsedCli {
  /** Positional arguments (allowed directories) */
  input: string[];
  flags: CLIFlags;
}
