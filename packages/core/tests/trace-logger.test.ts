import { describe, it, expect } from 'vitest';
import { TraceLogger } from '../src/trace-logger.js';

describe('TraceLogger', () => {
  it('creates and retrieves a trace', () => {
    const logger = new TraceLogger();
    logger.createTrace('trace_1', 'scenario');
    const trace = logger.getTrace('trace_1');

    expect(trace.traceId).toBe('trace_1');
    expect(trace.label).toBe('scenario');
    expect(trace.spans).toEqual([]);
    expect(trace.totalDurationMs).toBeGreaterThanOrEqual(0);
    expect(logger.hasTrace('trace_1')).toBe(false);
  });

  it('records spans and events', () => {
    const logger = new TraceLogger();
    logger.createTrace('trace_2', 'scenario');

    const spanId = logger.startSpan('trace_2', 'tick-1');
    logger.logEvent('trace_2', 'slot_write', { slot: 1 });
    logger.endSpan('trace_2', spanId);

    const trace = logger.getTrace('trace_2');
    expect(trace.spans).toHaveLength(1);
    expect(trace.spans[0].name).toBe('tick-1');
    expect(trace.spans[0].endTime).toBeDefined();
    expect(trace.spans[0].events).toHaveLength(1);
    expect(trace.spans[0].events[0].type).toBe('slot_write');
    expect(trace.spans[0].events[0].data).toEqual({ slot: 1 });
  });

  it('nests spans and logs span data as an info event', () => {
    const logger = new TraceLogger();
    logger.createTrace('trace_3', 'scenario');

    const outer = logger.startSpan('trace_3', 'tick-1');
    const inner = logger.startSpan('trace_3', 'wm', { store: 'wm' });
    logger.endSpan('trace_3', inner);
    logger.endSpan('trace_3', outer);

    const trace = logger.getTrace('trace_3');
    expect(trace.spans).toHaveLength(1);
    expect(trace.spans[0].children).toHaveLength(1);
    expect(trace.spans[0].children[0].events.map((e) => e.type)).toEqual(['info']);
    expect(trace.spans[0].children[0].events[0].data).toEqual({ store: 'wm' });
  });

  it('routes bound tracer events into the open span', () => {
    const logger = new TraceLogger();
    logger.createTrace('trace_4', 'scenario');
    const tracer = logger.bind('trace_4');

    tracer.event('flag_update', { raise: ['goal'] });
    const spanId = logger.startSpan('trace_4', 'tick-1');
    tracer.event('slot_clear', { slot: 2 });
    logger.endSpan('trace_4', spanId);

    const trace = logger.getTrace('trace_4');
    expect(trace.spans[0].events).toHaveLength(1);
    expect(trace.spans[0].events[0].data).toEqual({ slot: 2 });
  });

  it('throws for unknown traces', () => {
    const logger = new TraceLogger();
    expect(() => logger.startSpan('missing', 'x')).toThrow('Trace not found: missing');
    expect(() => logger.bind('missing')).toThrow('Trace not found: missing');
  });
});
