/**
 * Span attribute names.
 * Tool attributes follow the OTel GenAI semantic conventions
 * (https://opentelemetry.io/docs/specs/semconv/gen-ai/); MCP tools are GenAI tools.
 */

/** The name of the operation being performed */
export const ATTR_GEN_AI_OPERATION_NAME = 'gen_ai.operation.name';

/** Name of the tool being executed */
export const ATTR_GEN_AI_TOOL_NAME = 'gen_ai.tool.name';

/** The tool call identifier */
export const ATTR_GEN_AI_TOOL_CALL_ID = 'gen_ai.tool.call.id';

/** Error type or code (standard OTel) */
export const ATTR_ERROR_TYPE = 'error.type';

/** Permission tier the server runs with */
export const ATTR_FS_WARDEN_TIER = 'fs_warden.tier';

export const OPERATION_EXECUTE_TOOL = 'execute_tool';
