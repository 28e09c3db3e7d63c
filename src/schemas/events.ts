import { z } from "zod";

export const JOB_OUTPUT_STATE_CHANGE = "Microsoft.Media.JobOutputStateChange";
export const BLOB_CREATED = "Microsoft.Storage.BlobCreated";
export const SUBSCRIPTION_VALIDATION =
  "Microsoft.EventGrid.SubscriptionValidationEvent";

export const FINISHED_STATE = "Finished";

/** Event Grid schema envelope; `data` depends on `eventType`. */
export const eventGridEventSchema = z
  .object({
    id: z.string().min(1),
    topic: z.string().optional(),
    subject: z.string(),
    eventType: z.string().min(1),
    eventTime: z.string().optional(),
    dataVersion: z.string().optional(),
    metadataVersion: z.string().optional(),
    data: z.unknown(),
  })
  .passthrough();

export const eventGridBatchSchema = z.array(eventGridEventSchema).min(1);

export type EventGridEvent = z.infer<typeof eventGridEventSchema>;

export const jobOutputStateChangeDataSchema = z
  .object({
    previousState: z.string().optional(),
    output: z
      .object({
        "@odata.type": z.string().optional(),
        assetName: z.string().min(1),
        state: z.string().min(1),
        progress: z.number().optional(),
        label: z.string().optional(),
        error: z.unknown().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type JobOutputStateChangeData = z.infer<
  typeof jobOutputStateChangeDataSchema
>;

export const subscriptionValidationDataSchema = z.object({
  validationCode: z.string().min(1),
  validationUrl: z.string().optional(),
});

export const blobCreatedDataSchema = z
  .object({
    api: z.string().optional(),
    contentType: z.string().optional(),
    contentLength: z.number().int().nonnegative().optional(),
    blobType: z.string().optional(),
    url: z.string().url(),
  })
  .passthrough();

export type BlobCreatedData = z.infer<typeof blobCreatedDataSchema>;

interface EnvelopeFields {
  id: string;
  topic?: string;
  subject: string;
  eventType: string;
}

export type NotificationEvent =
  | (EnvelopeFields & {
      kind: "jobOutputStateChange";
      data: JobOutputStateChangeData;
    })
  | (EnvelopeFields & { kind: "ignored"; data: unknown })
  | (EnvelopeFields & { kind: "invalid"; data: unknown; reason: string });

export function toNotificationEvent(event: EventGridEvent): NotificationEvent {
  const envelope: EnvelopeFields = {
    id: event.id,
    topic: event.topic,
    subject: event.subject,
    eventType: event.eventType,
  };

  if (event.eventType !== JOB_OUTPUT_STATE_CHANGE) {
    return { ...envelope, kind: "ignored", data: event.data };
  }

  const parsed = jobOutputStateChangeDataSchema.safeParse(event.data);
  if (!parsed.success) {
    return {
      ...envelope,
      kind: "invalid",
      data: event.data,
      reason: parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; "),
    };
  }
  return { ...envelope, kind: "jobOutputStateChange", data: parsed.data };
}

/**
 * Returns the validation code when the batch is an Event Grid
 * subscription handshake.
 */
export function findValidationCode(events: EventGridEvent[]): string | undefined {
  for (const event of events) {
    if (event.eventType !== SUBSCRIPTION_VALIDATION) {
      continue;
    }
    const parsed = subscriptionValidationDataSchema.safeParse(event.data);
    if (parsed.success) {
      return parsed.data.validationCode;
    }
  }
  return undefined;
}

/** Splits `/blobServices/default/containers/<container>/blobs/<name>`. */
export function parseBlobSubject(
  subject: string
): { container: string; blobName: string } | null {
  const match = subject.match(
    /^\/blobServices\/default\/containers\/([^/]+)\/blobs\/(.+)$/
  );
  if (!match) {
    return null;
  }
  const [, container, blobName] = match;
  if (!container || !blobName) {
    return null;
  }
  return { container, blobName };
}
