import { v4 as uuidv4 } from 'uuid';

export interface RunContext {
  runId: string;
  source?: string;
  spans: SpanRecord[];
}

export interface SpanRecord {
  name: string;
  startTime: number;
  endTime?: number;
  attributes: Record<string, string | number | boolean>;
  status: 'ok' | 'error';
}

export function createRunContext(overrides?: Partial<RunContext>): RunContext {
  return {
    runId: overrides?.runId ?? uuidv4(),
    source: overrides?.source,
    spans: [],
  };
}

export function startSpan(ctx: RunContext, name: string, attrs?: Record<string, string | number | boolean>): SpanRecord {
  const span: SpanRecord = {
    name,
    startTime: Date.now(),
    attributes: attrs ?? {},
    status: 'ok',
  };
  ctx.spans.push(span);
  return span;
}

export function endSpan(span: SpanRecord, status: 'ok' | 'error' = 'ok'): void {
  span.endTime = Date.now();
  span.status = status;
}

/** Span durations keyed by name, for the end-of-run log line */
export function spanDurations(ctx: RunContext): Record<string, number> {
  const durations: Record<string, number> = {};
  for (const span of ctx.spans) {
    durations[span.name] = (span.endTime ?? Date.now()) - span.startTime;
  }
  return durations;
}
