export type TraceEventType =
  | 'flag_update'
  | 'slot_write'
  | 'slot_clear'
  | 'slot_read'
  | 'command_rejected'
  | 'info';

export interface TraceEvent {
  id: string;
  traceId: string;
  parentSpanId?: string;
  type: TraceEventType;
  timestamp: number;
  wallClock: string;
  data: Record<string, unknown>;
}

export interface TraceSpan {
  id: string;
  traceId: string;
  name: string;
  startTime: number;
  endTime?: number;
  events: TraceEvent[];
  children: TraceSpan[];
}

export interface ExecutionTrace {
  traceId: string;
  label: string;
  startedAt: string;
  completedAt?: string;
  totalDurationMs?: number;
  spans: TraceSpan[];
}
