/**
 * Span helpers for tool execution.
 */

import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';

import {
  ATTR_ERROR_TYPE,
  ATTR_FS_WARDEN_TIER,
  ATTR_GEN_AI_OPERATION_NAME,
  ATTR_GEN_AI_TOOL_CALL_ID,
  ATTR_GEN_AI_TOOL_NAME,
  OPERATION_EXECUTE_TOOL,
} from './conventions.js';
import { getTracer } from './setup.js';
import type { ToolSpanEndOptions, ToolSpanOptions } from './types.js';

/**
 * Start an `execute_tool <name>` span.
 * A no-op span is returned when telemetry is disabled.
 */
export function startToolSpan(options: ToolSpanOptions): Span {
  const span = getTracer().startSpan(`${OPERATION_EXECUTE_TOOL} ${options.toolName}`, {
    kind: SpanKind.INTERNAL,
    attributes: {
      [ATTR_GEN_AI_OPERATION_NAME]: OPERATION_EXECUTE_TOOL,
      [ATTR_GEN_AI_TOOL_NAME]: options.toolName,
    },
  });

  if (options.toolCallId !== undefined) {
    span.setAttribute(ATTR_GEN_AI_TOOL_CALL_ID, options.toolCallId);
  }
  if (options.tier !== undefined) {
    span.setAttribute(ATTR_FS_WARDEN_TIER, options.tier);
  }
  return span;
}

/**
 * Record the outcome and end the span.
 */
export function endToolSpan(span: Span, options: ToolSpanEndOptions): void {
  if (options.success) {
    span.setStatus({ code: SpanStatusCode.OK });
  } else {
    if (options.errorType !== undefined) {
      span.setAttribute(ATTR_ERROR_TYPE, options.errorType);
    }
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: options.errorType ?? 'Tool execution failed',
    });
  }

  span.end();
}
