import pino from "pino";
import { getMediaServiceOptions, loadConfig, type Env } from "../config";
import { AzureMediaClient, type MediaClient } from "../clients/media-client";
import {
  StorageIngestBlobSource,
  createConnectionStringReader,
  type BlobReader,
  type IngestBlobSource,
} from "../clients/ingest-storage";
import { IngestHandler } from "./ingest-handler";
import { CompletionHandler } from "./completion-handler";
import { MetricsRegistry } from "./metrics-registry";

export interface ServiceDependencies {
  config: Env;
  logger: pino.Logger;
  mediaClient: MediaClient;
  ingestSource: IngestBlobSource;
  ingestHandler: IngestHandler;
  completionHandler: CompletionHandler;
  metrics: MetricsRegistry;
}

const missingStorageReader: BlobReader = {
  async open() {
    throw new Error("INGEST_STORAGE_CONNECTION_STRING is not configured");
  },
};

export function createServiceDependencies(
  config: Env,
  overrides: { mediaClient?: MediaClient; blobReader?: BlobReader } = {}
): ServiceDependencies {
  const logger = pino({ level: config.LOG_LEVEL, name: "media-encoding-service" });
  const metrics = new MetricsRegistry();

  const mediaClient =
    overrides.mediaClient ??
    new AzureMediaClient({ options: getMediaServiceOptions(config), logger });

  const reader =
    overrides.blobReader ??
    (config.INGEST_STORAGE_CONNECTION_STRING
      ? createConnectionStringReader(config.INGEST_STORAGE_CONNECTION_STRING)
      : missingStorageReader);

  const ingestSource = new StorageIngestBlobSource({
    container: config.INGEST_CONTAINER,
    reader,
    logger,
  });

  const ingestHandler = new IngestHandler({
    mediaClient,
    metrics,
    transformName: config.MEDIA_TRANSFORM_NAME,
    uploadSasTtlMinutes: config.UPLOAD_SAS_TTL_MINUTES,
    logger: logger.child({ name: "ingest-handler" }),
  });

  const completionHandler = new CompletionHandler({
    mediaClient,
    metrics,
    streamingPolicyName: config.MEDIA_STREAMING_POLICY,
    logger: logger.child({ name: "completion-handler" }),
  });

  return {
    config,
    logger,
    mediaClient,
    ingestSource,
    ingestHandler,
    completionHandler,
    metrics,
  };
}

let cached: ServiceDependencies | null = null;

/** Process-wide dependency graph; the media client session lives here. */
export function getServiceDependencies(): ServiceDependencies {
  if (cached) {
    return cached;
  }
  cached = createServiceDependencies(loadConfig());
  return cached;
}
