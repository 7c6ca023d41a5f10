import { trace, SpanStatusCode, type Span } from "@opentelemetry/api";
import { logger, type LogAttributes } from "./logger.js";

export { logger };
export type { LogAttributes, LogLevel } from "./logger.js";

const tracer = trace.getTracer("acl-cache");

export function logInfo(message: string, attrs?: LogAttributes): void {
  logger.info(message, attrs);
}

/**
 * Run `fn` inside an active span. Exceptions are recorded on the span and
 * rethrown untouched.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      throw err;
    } finally {
      span.end();
    }
  });
}
