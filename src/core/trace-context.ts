/**
 * Trace Context Module
 *
 * AsyncLocalStorage-based trace context. Every poll tick runs under its own
 * trace (`tick_<n>`), and each reminder dispatched from it gets a child span,
 * so a reminder's evaluation, send and failure lines share one traceId.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Trace context for a tick or a command invocation.
 */
export interface TraceContext {
  /** Root trace ID (tick id or interaction id) */
  traceId: string;
  /** Grouping ID, e.g. the post-log key of the reminder being sent */
  correlationId?: string;
  /** Parent span ID */
  parentId?: string;
  /** Current span ID */
  spanId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Run a function with trace context.
 * All descendant async operations inherit this context automatically.
 *
 * @example
 * ```ts
 * await withTraceContext(createTraceContext('tick_42'), async () => {
 *   logger.info('Evaluating reminders'); // carries traceId='tick_42'
 * });
 * ```
 */
export function withTraceContext<T>(context: TraceContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Get the current trace context, or undefined outside withTraceContext.
 */
export function getTraceContext(): TraceContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Generate a span ID, nested under `parent` when given.
 */
export function generateChildSpan(parent?: string): string {
  const shortId = randomUUID().slice(0, 8);
  return parent ? `${parent}_${shortId}` : `root_${shortId}`;
}

/**
 * Create a new trace context rooted at `id`.
 */
export function createTraceContext(
  id: string,
  options: { correlationId?: string; parentId?: string; spanId?: string } = {}
): TraceContext {
  const result: TraceContext = {
    traceId: id,
    spanId: options.spanId ?? generateChildSpan(),
  };
  if (options.correlationId !== undefined) {
    result.correlationId = options.correlationId;
  }
  if (options.parentId !== undefined) {
    result.parentId = options.parentId;
  }
  return result;
}

/**
 * Derive a child context from the current one (or a fresh root if none).
 * Used for per-reminder spans inside a tick.
 */
export function createChildContext(correlationId?: string): TraceContext {
  const parent = getTraceContext();
  if (!parent) {
    const rootId = `trace_${randomUUID().slice(0, 8)}`;
    return createTraceContext(rootId, correlationId !== undefined ? { correlationId } : {});
  }

  const child: TraceContext = {
    traceId: parent.traceId,
    spanId: generateChildSpan(parent.spanId),
  };
  if (parent.spanId !== undefined) {
    child.parentId = parent.spanId;
  }
  const correlation = correlationId ?? parent.correlationId;
  if (correlation !== undefined) {
    child.correlationId = correlation;
  }
  return child;
}
