import { describe, expect, it } from "vitest";
import {
  isTracedRequest,
  observabilityConfigFromEnv,
} from "../../src/observability";
import { createTestConfig } from "../factories/test-config";

describe("observabilityConfigFromEnv", () => {
  it("projects exporter settings from the environment", () => {
    const config = createTestConfig({
      OTEL_TRACES_ENDPOINT: "http://collector.test:4318/v1/traces",
      OTEL_METRICS_ENDPOINT: "http://collector.test:4318/v1/metrics",
      OTEL_METRICS_INTERVAL_MS: "30000",
    });

    expect(observabilityConfigFromEnv(config, "media-encoding-service")).toMatchObject({
      serviceName: "media-encoding-service",
      environment: "test",
      tracesEndpoint: "http://collector.test:4318/v1/traces",
      metricsEndpoint: "http://collector.test:4318/v1/metrics",
      metricsExportIntervalMillis: 30000,
      untracedPaths: ["/health", "/metrics"],
    });
  });

  it("leaves exporters unset when no endpoint is configured", () => {
    const projected = observabilityConfigFromEnv(createTestConfig(), "svc");

    expect(projected.tracesEndpoint).toBeUndefined();
    expect(projected.metricsEndpoint).toBeUndefined();
  });
});

describe("isTracedRequest", () => {
  const untraced = ["/health", "/metrics"];

  it("skips health and scrape paths, with or without a query", () => {
    expect(isTracedRequest("/health", untraced)).toBe(false);
    expect(isTracedRequest("/metrics?format=text", untraced)).toBe(false);
  });

  it("traces event deliveries and look-alike paths", () => {
    expect(isTracedRequest("/events/ingest", untraced)).toBe(true);
    expect(isTracedRequest("/healthz", untraced)).toBe(true);
    expect(isTracedRequest(undefined, untraced)).toBe(true);
  });
});
