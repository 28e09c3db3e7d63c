import { trace, SpanStatusCode } from "@opentelemetry/api";

const tracer = trace.getTracer("media-encoding-service");

export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  run: () => Promise<T>
): Promise<T> {
  return tracer.startActiveSpan(name, async (span) => {
    span.setAttributes(attributes);
    try {
      return await run();
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({ code: SpanStatusCode.ERROR });
      throw error;
    } finally {
      span.end();
    }
  });
}
