import pino, { type Logger } from "pino";
import type { MediaClient, PublishResult } from "../clients/media-client";
import { FINISHED_STATE, type NotificationEvent } from "../schemas/events";
import type { MetricsRegistry } from "./metrics-registry";
import { withSpan } from "../observability/tracing";

export type CompletionOutcome =
  | { action: "published"; eventId: string; result: PublishResult }
  | { action: "ignored"; eventId: string; reason: string };

interface CompletionHandlerOptions {
  mediaClient: MediaClient;
  metrics: MetricsRegistry;
  streamingPolicyName: string;
  logger?: Logger;
}

/**
 * Publishes the output asset of an encoding job once its output reaches
 * the Finished state.
 */
export class CompletionHandler {
  private readonly mediaClient: MediaClient;
  private readonly metrics: MetricsRegistry;
  private readonly streamingPolicyName: string;
  private readonly logger: Logger;

  constructor(options: CompletionHandlerOptions) {
    this.mediaClient = options.mediaClient;
    this.metrics = options.metrics;
    this.streamingPolicyName = options.streamingPolicyName;
    this.logger = options.logger ?? pino({ name: "completion-handler" });
  }

  async handle(event: NotificationEvent): Promise<CompletionOutcome> {
    return withSpan(
      "media.completion",
      { "media.event_id": event.id, "media.event_type": event.eventType },
      () => this.complete(event)
    );
  }

  private async complete(event: NotificationEvent): Promise<CompletionOutcome> {
    this.logger.info(
      {
        eventId: event.id,
        topic: event.topic,
        subject: event.subject,
        eventType: event.eventType,
        data: event.data,
      },
      "Received media event"
    );

    await this.mediaClient.login();

    if (event.kind === "ignored") {
      this.metrics.recordEvent(event.eventType, "ignored");
      return this.ignore(event.id, `Unhandled event type ${event.eventType}`);
    }
    if (event.kind === "invalid") {
      this.logger.warn(
        { eventId: event.id, reason: event.reason },
        "Invalid job output payload"
      );
      this.metrics.recordEvent(event.eventType, "invalid");
      return this.ignore(event.id, `Invalid payload: ${event.reason}`);
    }

    const { output, previousState } = event.data;
    this.logger.info(
      { eventId: event.id, previousState, state: output.state },
      "Detected job output state change"
    );

    if (output.state !== FINISHED_STATE) {
      this.metrics.recordEvent(event.eventType, "ignored");
      return this.ignore(event.id, `Output state ${output.state}`);
    }

    this.logger.info({ assetName: output.assetName }, "Publishing asset");
    const result = await this.mediaClient.publishAsset(
      output.assetName,
      this.streamingPolicyName
    );

    if (result.status === "published") {
      this.metrics.recordPublish("success");
      this.metrics.recordEvent(event.eventType, "published");
    } else {
      this.metrics.recordPublish("failure");
      this.metrics.recordEvent(event.eventType, "publish_failed");
    }
    return { action: "published", eventId: event.id, result };
  }

  private ignore(eventId: string, reason: string): CompletionOutcome {
    this.logger.debug({ eventId, reason }, "Event ignored");
    return { action: "ignored", eventId, reason };
  }
}
