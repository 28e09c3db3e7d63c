import { NodeSDK, metrics } from "@opentelemetry/sdk-node";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { Resource } from "@opentelemetry/resources";
import { SemanticResourceAttributes } from "@opentelemetry/semantic-conventions";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import type { Env } from "../config";

export type ObservabilityConfig = {
  serviceName: string;
  serviceVersion: string;
  environment: Env["NODE_ENV"];
  tracesEndpoint?: string;
  metricsEndpoint?: string;
  metricsExportIntervalMillis: number;
  /** Incoming request paths that never produce a server span. */
  untracedPaths: readonly string[];
};

// Health checks and metrics scrapes
const UNTRACED_PATHS = ["/health", "/metrics"] as const;

export function observabilityConfigFromEnv(
  config: Env,
  serviceName: string
): ObservabilityConfig {
  return {
    serviceName,
    serviceVersion: process.env.npm_package_version ?? "0.0.0",
    environment: config.NODE_ENV,
    tracesEndpoint: config.OTEL_TRACES_ENDPOINT,
    metricsEndpoint: config.OTEL_METRICS_ENDPOINT,
    metricsExportIntervalMillis: config.OTEL_METRICS_INTERVAL_MS,
    untracedPaths: UNTRACED_PATHS,
  };
}

export function isTracedRequest(
  url: string | undefined,
  untracedPaths: readonly string[]
): boolean {
  if (!url) {
    return true;
  }
  const [path] = url.split("?");
  return !untracedPaths.includes(path ?? url);
}

let sdk: NodeSDK | null = null;

export function createTelemetrySdk(config: ObservabilityConfig): NodeSDK {
  const instrumentations = getNodeAutoInstrumentations({
    "@opentelemetry/instrumentation-fs": { enabled: false },
    "@opentelemetry/instrumentation-http": {
      ignoreIncomingRequestHook: (request) =>
        !isTracedRequest(request.url, config.untracedPaths),
    },
  });

  const metricReader = config.metricsEndpoint
    ? new metrics.PeriodicExportingMetricReader({
        exporter: new OTLPMetricExporter({ url: config.metricsEndpoint }),
        exportIntervalMillis: config.metricsExportIntervalMillis,
      })
    : undefined;

  return new NodeSDK({
    resource: new Resource({
      [SemanticResourceAttributes.SERVICE_NAME]: config.serviceName,
      [SemanticResourceAttributes.SERVICE_VERSION]: config.serviceVersion,
      [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: config.environment,
    }),
    traceExporter: config.tracesEndpoint
      ? new OTLPTraceExporter({ url: config.tracesEndpoint })
      : undefined,
    metricReader,
    instrumentations,
  });
}

export function startObservability(config: ObservabilityConfig): NodeSDK {
  if (!sdk) {
    sdk = createTelemetrySdk(config);
    sdk.start();
  }
  return sdk;
}

export async function shutdownObservability() {
  if (!sdk) {
    return;
  }
  await sdk.shutdown();
  sdk = null;
}
