import { randomUUID } from "node:crypto";
import { basename } from "node:path";
import pino, { type Logger } from "pino";
import type { Asset } from "@azure/arm-mediaservices";
import type { MediaClient } from "../clients/media-client";
import type { IngestBlob } from "../clients/ingest-storage";
import type { MetricsRegistry } from "./metrics-registry";
import { withSpan } from "../observability/tracing";

export interface IngestNames {
  jobName: string;
  inputAssetName: string;
  outputAssetName: string;
}

export interface IngestResult extends IngestNames {
  transformName: string;
}

interface IngestHandlerOptions {
  mediaClient: MediaClient;
  metrics: MetricsRegistry;
  transformName: string;
  uploadSasTtlMinutes: number;
  logger?: Logger;
  /** Source of random identifiers, overridable in tests. */
  generateId?: () => string;
}

/**
 * Short uniqueness token: the first ten characters of a v4 UUID with the
 * dash removed.
 */
export function createUniquenessToken(generateId: () => string = randomUUID) {
  return generateId().substring(0, 10).replace(/-/g, "");
}

export function deriveIngestNames(token: string): IngestNames {
  return {
    jobName: `job-${token}`,
    inputAssetName: `input-${token}`,
    outputAssetName: `output-${token}`,
  };
}

export function collisionFreeName(
  blobName: string,
  generateId: () => string = randomUUID
): string {
  return `${blobName}-${generateId()}`.toLowerCase();
}

export class IngestHandler {
  private readonly mediaClient: MediaClient;
  private readonly metrics: MetricsRegistry;
  private readonly transformName: string;
  private readonly uploadSasTtlMs: number;
  private readonly logger: Logger;
  private readonly generateId: () => string;

  constructor(options: IngestHandlerOptions) {
    this.mediaClient = options.mediaClient;
    this.metrics = options.metrics;
    this.transformName = options.transformName;
    this.uploadSasTtlMs = options.uploadSasTtlMinutes * 60 * 1000;
    this.logger = options.logger ?? pino({ name: "ingest-handler" });
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Looks up the input asset a previous delivery of the same event created.
   * Event Grid redelivers whole batches, so a blob that was already
   * submitted must not be encoded twice.
   */
  async findIngested(deliveryId: string): Promise<Asset | undefined> {
    await this.mediaClient.login();
    const existing = await this.mediaClient.findAssetByAlternateId(deliveryId);
    if (existing) {
      this.metrics.recordIngest("duplicate");
      this.logger.info(
        { deliveryId, inputAssetName: existing.name },
        "Blob already ingested"
      );
    }
    return existing;
  }

  async handle(blob: IngestBlob): Promise<IngestResult> {
    try {
      return await withSpan(
        "media.ingest",
        { "media.blob_name": blob.name, "media.blob_size": blob.size },
        () => this.ingest(blob)
      );
    } finally {
      blob.content.destroy();
    }
  }

  private async ingest(blob: IngestBlob): Promise<IngestResult> {
    this.logger.info(
      { blobName: blob.name, sizeBytes: blob.size, deliveryId: blob.deliveryId },
      "Received ingest blob"
    );
    await this.mediaClient.login();

    const names = deriveIngestNames(createUniquenessToken(this.generateId));
    const { jobName, inputAssetName } = names;
    let { outputAssetName } = names;
    this.logger.info(names, "Derived asset names");

    let inputCreated = false;
    try {
      await this.mediaClient.createAsset(
        inputAssetName,
        `Import - ${basename(blob.name)}`,
        blob.deliveryId
      );
      inputCreated = true;

      const containerUrl = await this.mediaClient.getUploadContainerUrl(
        inputAssetName,
        new Date(Date.now() + this.uploadSasTtlMs)
      );
      await this.mediaClient.uploadContent(containerUrl, blob.name, blob.content);

      const existing = await this.mediaClient.getAsset(outputAssetName);
      if (existing) {
        const replacement = collisionFreeName(blob.name, this.generateId);
        this.logger.warn(
          { outputAssetName, replacement },
          "Output asset already exists, using a new name"
        );
        outputAssetName = replacement;
      }

      await this.mediaClient.createAsset(outputAssetName);

      const transform = await this.mediaClient.getOrCreateTransform(
        this.transformName
      );
      const transformName = transform.name ?? this.transformName;

      await this.mediaClient.submitJob(transformName, jobName, inputAssetName, [
        outputAssetName,
      ]);

      this.metrics.recordIngest("submitted");
      this.logger.info(
        { jobName, inputAssetName, outputAssetName, transformName },
        "Encoding job submitted"
      );
      return { jobName, inputAssetName, outputAssetName, transformName };
    } catch (error) {
      this.metrics.recordIngest("failure");
      this.logger.error(
        { err: error, jobName, inputAssetName, outputAssetName },
        "Ingest failed"
      );
      if (inputCreated) {
        await this.removeOrphanedInput(inputAssetName);
      }
      throw error;
    }
  }

  private async removeOrphanedInput(inputAssetName: string): Promise<void> {
    try {
      await this.mediaClient.deleteAsset(inputAssetName);
      this.logger.info({ inputAssetName }, "Removed orphaned input asset");
    } catch (cleanupError) {
      this.logger.error(
        { err: cleanupError, inputAssetName },
        "Failed to remove orphaned input asset"
      );
    }
  }
}
