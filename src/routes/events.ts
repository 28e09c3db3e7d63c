import type { FastifyInstance, FastifyRequest } from "fastify";
import {
  BLOB_CREATED,
  eventGridBatchSchema,
  findValidationCode,
  toNotificationEvent,
  type EventGridEvent,
} from "../schemas/events";
import type { IngestResult } from "../services/ingest-handler";
import type { CompletionOutcome } from "../services/completion-handler";

type IngestOutcome =
  | ({ eventId: string; status: "submitted" } & IngestResult)
  | { eventId: string; status: "skipped"; reason: string };

function handshake(
  events: EventGridEvent[],
  request: FastifyRequest
): { validationResponse: string } | undefined {
  const validationCode = findValidationCode(events);
  if (!validationCode) {
    return undefined;
  }
  request.log.info("Answering Event Grid subscription validation");
  return { validationResponse: validationCode };
}

/**
 * Event Grid webhook endpoints. Blob arrivals drive ingest, job output
 * state changes drive publishing.
 */
export default async function eventRoutes(fastify: FastifyInstance) {
  fastify.post(
    "/ingest",
    {
      schema: {
        body: eventGridBatchSchema,
      },
    },
    async (request) => {
      const events = eventGridBatchSchema.parse(request.body);
      const validation = handshake(events, request);
      if (validation) {
        return validation;
      }

      const { ingestSource, ingestHandler } = fastify.services;
      const processed: IngestOutcome[] = [];
      let failures = 0;

      for (const event of events) {
        if (event.eventType !== BLOB_CREATED) {
          processed.push({
            eventId: event.id,
            status: "skipped",
            reason: `Unhandled event type ${event.eventType}`,
          });
          continue;
        }

        const ref = ingestSource.resolve(event);
        if (!ref) {
          processed.push({
            eventId: event.id,
            status: "skipped",
            reason: `Not an ingest blob: ${event.subject}`,
          });
          continue;
        }

        try {
          const existing = await ingestHandler.findIngested(ref.deliveryId);
          if (existing) {
            processed.push({
              eventId: event.id,
              status: "skipped",
              reason: `Already ingested as ${existing.name ?? "unnamed asset"}`,
            });
            continue;
          }
          const blob = await ingestSource.open(ref);
          const result = await ingestHandler.handle(blob);
          processed.push({ eventId: event.id, status: "submitted", ...result });
        } catch (error) {
          failures += 1;
          request.log.error(
            { err: error, eventId: event.id, subject: event.subject },
            "Failed to ingest blob"
          );
        }
      }

      // Event Grid redelivers the whole batch; already submitted blobs are
      // skipped by their event id on the next attempt.
      if (failures > 0) {
        throw fastify.httpErrors.internalServerError("Failed to ingest blob");
      }

      return { processed };
    }
  );

  fastify.post(
    "/media",
    {
      schema: {
        body: eventGridBatchSchema,
      },
    },
    async (request) => {
      const events = eventGridBatchSchema.parse(request.body);
      const validation = handshake(events, request);
      if (validation) {
        return validation;
      }

      const results: CompletionOutcome[] = [];
      for (const event of events) {
        results.push(
          await fastify.services.completionHandler.handle(
            toNotificationEvent(event)
          )
        );
      }
      return { results };
    }
  );
}
