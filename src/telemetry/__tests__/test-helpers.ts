/**
 * Test helpers for capturing spans in memory.
 */

import { InMemorySpanExporter } from '@opentelemetry/sdk-trace-base';
import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';

import { initializeTelemetry, shutdown } from '../index.js';

export interface SpanCapture {
  exporter: InMemorySpanExporter;
  getSpans: () => ReadableSpan[];
  /** First finished span (throws if none) */
  getFirstSpan: () => ReadableSpan;
  getAttribute: (span: ReadableSpan, key: string) => unknown;
  shutdown: () => Promise<void>;
}

/**
 * Initialize telemetry with an in-memory exporter.
 *
 * NOTE: Always call `await capture.shutdown()` in afterEach.
 */
export async function initializeTestTelemetry(): Promise<SpanCapture> {
  // Clean state in case a previous test did not shut down
  await shutdown();

  const exporter = new InMemorySpanExporter();
  initializeTelemetry({
    config: { enabled: true },
    customExporter: exporter,
    serviceName: 'test-service',
  });

  return {
    exporter,
    getSpans: () => exporter.getFinishedSpans(),
    getFirstSpan: () => {
      const first = exporter.getFinishedSpans()[0];
      if (first === undefined) {
        throw new Error('No spans captured');
      }
      return first;
    },
    getAttribute: (span, key) => span.attributes[key],
    shutdown: async () => {
      await shutdown();
    },
  };
}
