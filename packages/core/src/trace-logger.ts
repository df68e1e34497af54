import {
  generateId,
  monotonicNow,
  elapsedSince,
  isoNow,
  type TraceEvent,
  type TraceSpan,
  type ExecutionTrace,
  type TraceEventType,
} from '@wmreg/shared';

/** Sink a store reports its per-tick events to. */
export interface StepTracer {
  event(type: TraceEventType, data: Record<string, unknown>): void;
}

interface TraceState {
  traceId: string;
  label: string;
  startedAt: string;
  startTime: number;
  spans: TraceSpan[];
  spanStack: string[];
}

export class TraceLogger {
  private traces = new Map<string, TraceState>();

  createTrace(traceId: string, label: string): void {
    this.traces.set(traceId, {
      traceId,
      label,
      startedAt: isoNow(),
      startTime: monotonicNow(),
      spans: [],
      spanStack: [],
    });
  }

  startSpan(traceId: string, name: string, data?: Record<string, unknown>): string {
    const state = this.getState(traceId);
    const spanId = generateId('span');
    const parentSpanId = state.spanStack.length > 0
      ? state.spanStack[state.spanStack.length - 1]
      : undefined;

    const span: TraceSpan = {
      id: spanId,
      traceId,
      name,
      startTime: monotonicNow(),
      events: [],
      children: [],
    };

    if (parentSpanId) {
      const parent = this.findSpan(state.spans, parentSpanId);
      parent?.children.push(span);
    } else {
      state.spans.push(span);
    }

    state.spanStack.push(spanId);

    if (data) {
      this.logEvent(traceId, 'info', data, spanId);
    }
    return spanId;
  }

  endSpan(traceId: string, spanId: string): void {
    const state = this.getState(traceId);
    const span = this.findSpan(state.spans, spanId);
    if (span) {
      span.endTime = monotonicNow();
    }
    const idx = state.spanStack.indexOf(spanId);
    if (idx !== -1) {
      state.spanStack.splice(idx, 1);
    }
  }

  /** Events outside any open span are dropped. */
  logEvent(
    traceId: string,
    type: TraceEventType,
    data: Record<string, unknown>,
    parentSpanId?: string,
  ): void {
    const state = this.getState(traceId);
    const event: TraceEvent = {
      id: generateId('evt'),
      traceId,
      parentSpanId: parentSpanId ?? state.spanStack[state.spanStack.length - 1],
      type,
      timestamp: monotonicNow(),
      wallClock: isoNow(),
      data,
    };

    const spanId = event.parentSpanId;
    if (spanId) {
      const span = this.findSpan(state.spans, spanId);
      span?.events.push(event);
    }
  }

  /** Binds a trace so a store can report without knowing trace ids. */
  bind(traceId: string): StepTracer {
    this.getState(traceId);
    return {
      event: (type, data) => this.logEvent(traceId, type, data),
    };
  }

  getTrace(traceId: string): ExecutionTrace {
    const state = this.getState(traceId);
    const trace: ExecutionTrace = {
      traceId: state.traceId,
      label: state.label,
      startedAt: state.startedAt,
      completedAt: isoNow(),
      totalDurationMs: elapsedSince(state.startTime),
      spans: state.spans,
    };

    this.traces.delete(traceId);
    return trace;
  }

  hasTrace(traceId: string): boolean {
    return this.traces.has(traceId);
  }

  private getState(traceId: string): TraceState {
    const state = this.traces.get(traceId);
    if (!state) throw new Error(`Trace not found: ${traceId}`);
    return state;
  }

  private findSpan(spans: TraceSpan[], id: string): TraceSpan | undefined {
    for (const span of spans) {
      if (span.id === id) return span;
      const found = this.findSpan(span.children, id);
      if (found) return found;
    }
    return undefined;
  }
}
