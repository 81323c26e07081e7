/**
 * Telemetry type definitions.
 */

import type { SpanExporter } from '@opentelemetry/sdk-trace-base';
import type { TelemetryConfig } from '../config/schema.js';

// -----------------------------------------------------------------------------
// Error Types
// -----------------------------------------------------------------------------

export type TelemetryErrorCode = 'ALREADY_INITIALIZED' | 'NOT_INITIALIZED' | 'UNKNOWN';

export interface TelemetrySuccessResponse<T = void> {
  success: true;
  result: T;
  message: string;
}

export interface TelemetryErrorResponse {
  success: false;
  error: TelemetryErrorCode;
  message: string;
}

export type TelemetryResponse<T = void> = TelemetrySuccessResponse<T> | TelemetryErrorResponse;

// -----------------------------------------------------------------------------
// Configuration Types
// -----------------------------------------------------------------------------

export type ExporterType = 'otlp' | 'console' | 'none';

/**
 * Options for telemetry initialization.
 */
export interface TelemetryOptions {
  /** Telemetry configuration from config system */
  config: Readonly<TelemetryConfig>;
  /** Service name for traces (defaults to the server name) */
  serviceName?: string;
  serviceVersion?: string;
  /** Override exporter type (defaults to 'otlp') */
  exporterType?: ExporterType;
  /** Callback for debug messages */
  onDebug?: (message: string) => void;
  /** Custom span exporter for testing (bypasses type-based exporter creation) */
  customExporter?: SpanExporter;
}

export interface TelemetryInitResult {
  /** Whether telemetry is enabled and exporting */
  enabled: boolean;
  exporterType: ExporterType;
  /** The endpoint being used (if OTLP) */
  endpoint?: string;
  serviceName: string;
}

// -----------------------------------------------------------------------------
// Span Types
// -----------------------------------------------------------------------------

/**
 * Options for starting a tool span.
 */
export interface ToolSpanOptions {
  toolName: string;
  /** MCP request id */
  toolCallId?: string;
  /** Permission tier of the server */
  tier?: string;
}

/**
 * Options for ending a tool span.
 */
export interface ToolSpanEndOptions {
  success: boolean;
  /** Error code if execution failed */
  errorType?: string;
}
