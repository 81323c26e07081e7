/**
 * Telemetry module - OpenTelemetry setup and tool spans.
 */

export type {
  TelemetryErrorCode,
  TelemetrySuccessResponse,
  TelemetryErrorResponse,
  TelemetryResponse,
  ExporterType,
  TelemetryOptions,
  TelemetryInitResult,
  ToolSpanOptions,
  ToolSpanEndOptions,
} from './types.js';

export {
  initializeTelemetry,
  getTracer,
  isEnabled,
  getConfig,
  shutdown,
  DEFAULT_OTLP_HTTP_ENDPOINT,
} from './setup.js';

export { startToolSpan, endToolSpan } from './spans.js';

export * from './conventions.js';
