import pino, { type Logger } from 'pino';
import { trace } from '@opentelemetry/api';

export type { Logger };

export const logger: Logger = pino({
  name: 'loomwork',
  level: process.env.LOG_LEVEL ?? 'info',
  mixin() {
    const span = trace.getActiveSpan();
    if (!span) return {};
    const ctx = span.spanContext();
    return {
      traceId: ctx.traceId,
      spanId: ctx.spanId,
    };
  },
});
