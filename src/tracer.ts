/**
 * OpenTelemetry tracing for the Jina client.
 *
 * Client calls always go through `getTracer()`. Until an application registers
 * a tracer provider those spans are no-ops. `initTracer()` registers one backed
 * by an in-memory exporter so finished spans can be inspected locally.
 */

import { trace, context, type Tracer } from '@opentelemetry/api';
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
  type ReadableSpan,
} from '@opentelemetry/sdk-trace-base';
import { AsyncHooksContextManager } from '@opentelemetry/context-async-hooks';

export const TRACER_NAME = 'jina-client';
export const TRACER_VERSION = '0.1.0';

interface Capture {
  exporter: InMemorySpanExporter;
  processor: SimpleSpanProcessor;
}

// Registered once per process; the global API cannot swap providers later.
let provider: BasicTracerProvider | null = null;
let capture: Capture | null = null;

function registerProvider(): BasicTracerProvider {
  const contextManager = new AsyncHooksContextManager();
  contextManager.enable();
  context.setGlobalContextManager(contextManager);

  const registered = new BasicTracerProvider();
  registered.register();
  return registered;
}

/**
 * Start capturing client spans in a fresh in-memory exporter.
 *
 * Does nothing while a capture is already running.
 */
export function initTracer(): void {
  if (capture !== null) {
    return;
  }
  provider ??= registerProvider();

  const exporter = new InMemorySpanExporter();
  const processor = new SimpleSpanProcessor(exporter);
  provider.addSpanProcessor(processor);
  capture = { exporter, processor };
}

export function getTracer(): Tracer {
  return trace.getTracer(TRACER_NAME, TRACER_VERSION);
}

/**
 * Finished spans captured since the last clear. Empty unless `initTracer()` ran.
 */
export function getFinishedSpans(): ReadableSpan[] {
  return capture === null ? [] : [...capture.exporter.getFinishedSpans()];
}

export function clearSpans(): void {
  capture?.exporter.reset();
}

/**
 * Stop the current capture and drop its spans. The next `initTracer()` starts
 * a new one on the same provider.
 */
export async function resetTracer(): Promise<void> {
  if (capture === null) {
    return;
  }
  const { processor } = capture;
  capture = null;
  await processor.shutdown();
}

export function isInitialized(): boolean {
  return capture !== null;
}

export type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
