import { Counter, Registry } from "prom-client";

export type IngestResult = "submitted" | "duplicate" | "failure";
export type EventAction = "published" | "publish_failed" | "ignored" | "invalid";

export class MetricsRegistry {
  private readonly registry = new Registry();

  readonly ingestCounter = new Counter({
    name: "media_ingest_total",
    help: "Blob ingest attempts by result",
    labelNames: ["result"],
    registers: [this.registry],
  });

  readonly eventCounter = new Counter({
    name: "media_events_total",
    help: "Media notification events by type and action taken",
    labelNames: ["eventType", "action"],
    registers: [this.registry],
  });

  readonly publishCounter = new Counter({
    name: "media_publish_total",
    help: "Streaming locator publish attempts",
    labelNames: ["result"],
    registers: [this.registry],
  });

  recordIngest(result: IngestResult) {
    this.ingestCounter.inc({ result });
  }

  recordEvent(eventType: string, action: EventAction) {
    this.eventCounter.inc({ eventType, action });
  }

  recordPublish(result: "success" | "failure") {
    this.publishCounter.inc({ result });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
