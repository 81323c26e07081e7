/**
 * OpenTelemetry setup and initialization.
 *
 * Tracing only, with manual spans on a BasicTracerProvider. When disabled the
 * global no-op tracer stays in place, so span helpers cost nothing.
 */

import { diag, DiagConsoleLogger, DiagLogLevel, trace } from '@opentelemetry/api';
import type { Tracer } from '@opentelemetry/api';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { resourceFromAttributes } from '@opentelemetry/resources';
import {
  BasicTracerProvider,
  ConsoleSpanExporter,
  SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import type { SpanExporter } from '@opentelemetry/sdk-trace-base';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';

import { SERVER_NAME, SERVER_VERSION } from '../config/constants.js';
import type { TelemetryInitResult, TelemetryOptions, TelemetryResponse } from './types.js';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const DEFAULT_OTLP_HTTP_ENDPOINT = 'http://localhost:4318/v1/traces';

// -----------------------------------------------------------------------------
// Module State
// -----------------------------------------------------------------------------

let initialized = false;
let tracerProvider: BasicTracerProvider | null = null;
let initResult: TelemetryInitResult | null = null;

function successResponse<T>(result: T, message: string): TelemetryResponse<T> {
  return { success: true, result, message };
}

// -----------------------------------------------------------------------------
// Main Setup Function
// -----------------------------------------------------------------------------

/**
 * Initialize OpenTelemetry tracing.
 *
 * @example
 * const result = initializeTelemetry({
 *   config: { enabled: true, otlpEndpoint: 'http://localhost:4318/v1/traces' },
 * });
 */
export function initializeTelemetry(
  options: TelemetryOptions
): TelemetryResponse<TelemetryInitResult> {
  const { config } = options;
  const debug = options.onDebug ?? ((): void => {});
  const serviceName = options.serviceName ?? SERVER_NAME;

  if (initialized) {
    return {
      success: false,
      error: 'ALREADY_INITIALIZED',
      message: 'Telemetry has already been initialized. Call shutdown() first to reinitialize.',
    };
  }

  const exporterType = options.exporterType ?? 'otlp';
  if (!config.enabled || (exporterType === 'none' && options.customExporter === undefined)) {
    debug('Telemetry disabled (no-op tracer)');
    initResult = { enabled: false, exporterType: 'none', serviceName };
    initialized = true;
    return successResponse(initResult, 'Telemetry disabled');
  }

  let exporter: SpanExporter;
  let endpoint: string | undefined;
  if (options.customExporter !== undefined) {
    debug('Using custom span exporter');
    exporter = options.customExporter;
  } else if (exporterType === 'console') {
    debug('Creating console exporter');
    exporter = new ConsoleSpanExporter();
  } else {
    endpoint = config.otlpEndpoint ?? DEFAULT_OTLP_HTTP_ENDPOINT;
    debug(`Creating OTLP HTTP exporter for ${endpoint}`);
    exporter = new OTLPTraceExporter({ url: endpoint });
  }

  tracerProvider = new BasicTracerProvider({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: serviceName,
      [ATTR_SERVICE_VERSION]: options.serviceVersion ?? SERVER_VERSION,
    }),
    spanProcessors: [new SimpleSpanProcessor(exporter)],
  });
  trace.setGlobalTracerProvider(tracerProvider);

  if (process.env['DEBUG_OTEL'] === 'true') {
    diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.DEBUG);
  }

  initResult = { enabled: true, exporterType, endpoint, serviceName };
  initialized = true;
  debug(`Telemetry initialized: ${JSON.stringify(initResult)}`);

  return successResponse(initResult, `Telemetry initialized with ${exporterType} exporter`);
}

// -----------------------------------------------------------------------------
// Getter Functions
// -----------------------------------------------------------------------------

/**
 * Get a tracer instance. Returns a no-op tracer while telemetry is disabled.
 */
export function getTracer(name?: string, version?: string): Tracer {
  return trace.getTracer(name ?? initResult?.serviceName ?? SERVER_NAME, version);
}

export function isEnabled(): boolean {
  return initialized && (initResult?.enabled ?? false);
}

/**
 * Current telemetry configuration, or null if not initialized.
 */
export function getConfig(): TelemetryInitResult | null {
  return initResult;
}

/**
 * Shutdown telemetry, flushing any pending spans.
 * Must be called before reinitializing.
 */
export async function shutdown(): Promise<TelemetryResponse> {
  if (!initialized) {
    return {
      success: false,
      error: 'NOT_INITIALIZED',
      message: 'Telemetry is not initialized',
    };
  }

  try {
    if (tracerProvider) {
      await tracerProvider.shutdown();
      tracerProvider = null;
    }
    // Allows a fresh provider to be registered on the next initialize
    trace.disable();
    initialized = false;
    initResult = null;
    return successResponse(undefined, 'Telemetry shutdown complete');
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Unknown error during shutdown';
    return { success: false, error: 'UNKNOWN', message };
  }
}
