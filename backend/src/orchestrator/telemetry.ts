import { context, SpanStatusCode, trace, type Attributes, type Tracer } from '@opentelemetry/api';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { ConsoleSpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-proto';
import { Resource } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import { config } from '../config/app.js';

const TRACER_NAME = 'econ-insight-agent';

let provider: NodeTracerProvider | null = null;

function registerProvider(): NodeTracerProvider {
  const tracerProvider = new NodeTracerProvider({
    resource: new Resource({
      [SemanticResourceAttributes.SERVICE_NAME]: config.OTEL_SERVICE_NAME,
      [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: config.NODE_ENV
    })
  });

  if (config.OTEL_EXPORTER_OTLP_ENDPOINT) {
    tracerProvider.addSpanProcessor(
      new SimpleSpanProcessor(new OTLPTraceExporter({ url: config.OTEL_EXPORTER_OTLP_ENDPOINT }))
    );
  }
  if (config.ENABLE_CONSOLE_TRACING) {
    tracerProvider.addSpanProcessor(new SimpleSpanProcessor(new ConsoleSpanExporter()));
  }

  tracerProvider.register();
  return tracerProvider;
}

/** Spans are only exported when an OTLP endpoint or console tracing is configured. */
export function getTracer(): Tracer {
  provider ??= registerProvider();
  return trace.getTracer(TRACER_NAME);
}

/** Flushes pending spans; called once on shutdown. */
export async function shutdownTracing(): Promise<void> {
  if (!provider) {
    return;
  }
  const current = provider;
  provider = null;
  await current.shutdown();
}

/** Runs `fn` inside an active span named `name`; a rejection marks the span as failed and is rethrown. */
export async function traced<T>(name: string, fn: () => Promise<T>, attributes?: Attributes): Promise<T> {
  const span = getTracer().startSpan(name, attributes ? { attributes } : undefined);
  try {
    const result = await context.with(trace.setSpan(context.active(), span), fn);
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    span.recordException(err);
    span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
    throw error;
  } finally {
    span.end();
  }
}
