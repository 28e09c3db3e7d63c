import { Readable } from "node:stream";
import pino, { type Logger } from "pino";
import { BlobServiceClient } from "@azure/storage-blob";
import {
  blobCreatedDataSchema,
  parseBlobSubject,
  type EventGridEvent,
} from "../schemas/events";

/** A newly arrived object in the ingest container, opened for reading. */
export interface IngestBlob {
  name: string;
  content: Readable;
  size: number;
  /** Event Grid event id of the delivery that announced the blob. */
  deliveryId?: string;
}

/** A `BlobCreated` event that points into the ingest container. */
export interface IngestBlobRef {
  deliveryId: string;
  container: string;
  blobName: string;
  contentLength?: number;
}

export interface BlobDownload {
  content: Readable;
  contentLength?: number;
}

export interface BlobReader {
  open(container: string, blobName: string): Promise<BlobDownload>;
}

export interface IngestBlobSource {
  resolve(event: EventGridEvent): IngestBlobRef | undefined;
  open(ref: IngestBlobRef): Promise<IngestBlob>;
}

interface StorageIngestBlobSourceOptions {
  container: string;
  reader: BlobReader;
  logger?: Logger;
}

export function createConnectionStringReader(
  connectionString: string
): BlobReader {
  const service = BlobServiceClient.fromConnectionString(connectionString);
  return {
    async open(container, blobName) {
      const response = await service
        .getContainerClient(container)
        .getBlobClient(blobName)
        .download();
      const body = response.readableStreamBody;
      if (!body) {
        throw new Error(`Blob ${container}/${blobName} returned no content stream`);
      }
      return {
        content: body instanceof Readable ? body : Readable.from(body),
        contentLength: response.contentLength,
      };
    },
  };
}

/**
 * Resolves `Microsoft.Storage.BlobCreated` events for the ingest container
 * and opens the blob as a stream.
 */
export class StorageIngestBlobSource implements IngestBlobSource {
  private readonly container: string;
  private readonly reader: BlobReader;
  private readonly logger: Logger;

  constructor(options: StorageIngestBlobSourceOptions) {
    this.container = options.container;
    this.reader = options.reader;
    this.logger = (options.logger ?? pino({ name: "ingest-storage" })).child({
      component: "ingest-storage",
    });
  }

  resolve(event: EventGridEvent): IngestBlobRef | undefined {
    const location = parseBlobSubject(event.subject);
    if (!location) {
      this.logger.warn({ subject: event.subject }, "Unrecognised blob subject");
      return undefined;
    }
    if (location.container !== this.container) {
      this.logger.debug(
        { container: location.container, expected: this.container },
        "Skipping blob outside ingest container"
      );
      return undefined;
    }

    const data = blobCreatedDataSchema.safeParse(event.data);
    if (!data.success) {
      this.logger.warn(
        { eventId: event.id, errors: data.error.issues },
        "Invalid BlobCreated payload"
      );
      return undefined;
    }

    return {
      deliveryId: event.id,
      container: location.container,
      blobName: location.blobName,
      contentLength: data.data.contentLength,
    };
  }

  async open(ref: IngestBlobRef): Promise<IngestBlob> {
    const download = await this.reader.open(ref.container, ref.blobName);
    return {
      name: ref.blobName,
      content: download.content,
      size: ref.contentLength ?? download.contentLength ?? 0,
      deliveryId: ref.deliveryId,
    };
  }
}
