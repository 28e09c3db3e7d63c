import { randomUUID } from "node:crypto";
import { basename } from "node:path";
import type { Readable } from "node:stream";
import pino, { type Logger } from "pino";
import {
  AzureMediaServices,
  KnownAssetContainerPermission,
  KnownEncoderNamedPreset,
  type Asset,
  type Assets,
  type Job,
  type Jobs,
  type StreamingLocators,
  type StreamingPolicies,
  type Transform,
  type TransformOutput,
  type Transforms,
} from "@azure/arm-mediaservices";
import { isRestError } from "@azure/core-rest-pipeline";
import { ClientSecretCredential, type TokenCredential } from "@azure/identity";
import { ContainerClient } from "@azure/storage-blob";
import type { MediaServiceOptions } from "../config";

export type MediaErrorCode =
  | "NOT_LOGGED_IN"
  | "NO_CONTAINER_URL"
  | "AUTHENTICATION_FAILED";

export class MediaServiceError extends Error {
  constructor(
    message: string,
    public readonly code: MediaErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "MediaServiceError";
  }
}

export class MediaAuthenticationError extends MediaServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "AUTHENTICATION_FAILED", options);
    this.name = "MediaAuthenticationError";
  }
}

export type PublishResult =
  | { status: "published"; assetName: string; locatorName: string; locatorId: string }
  | { status: "failed"; assetName: string; locatorName: string; error: string };

/**
 * Capabilities the ingest and completion handlers need from the remote
 * media service.
 */
export interface MediaClient {
  login(): Promise<void>;
  createAsset(
    name: string,
    description?: string,
    alternateId?: string
  ): Promise<Asset>;
  getAsset(name: string): Promise<Asset | undefined>;
  findAssetByAlternateId(alternateId: string): Promise<Asset | undefined>;
  deleteAsset(name: string): Promise<void>;
  getUploadContainerUrl(assetName: string, expiresAt: Date): Promise<URL>;
  uploadContent(containerUrl: URL, fileName: string, content: Readable): Promise<void>;
  getOrCreateTransform(name: string): Promise<Transform>;
  submitJob(
    transformName: string,
    jobName: string,
    inputAssetName: string,
    outputAssetNames: string[]
  ): Promise<Job>;
  publishAsset(assetName: string, streamingPolicyName: string): Promise<PublishResult>;
}

/**
 * The subset of the management SDK surface this client calls.
 * `AzureMediaServices` satisfies it structurally.
 */
export interface MediaServicesApi {
  assets: Pick<
    Assets,
    "get" | "list" | "createOrUpdate" | "delete" | "listContainerSas"
  >;
  transforms: Pick<Transforms, "get" | "createOrUpdate">;
  jobs: Pick<Jobs, "create">;
  streamingPolicies: Pick<StreamingPolicies, "get">;
  streamingLocators: Pick<StreamingLocators, "create">;
}

export interface UploadContainer {
  upload(fileName: string, content: Readable, contentType: string): Promise<void>;
}

export type UploadContainerFactory = (containerUrl: URL) => UploadContainer;

export const VIDEO_CONTENT_TYPE = "video/mp4";

const UPLOAD_BLOCK_SIZE = 4 * 1024 * 1024;
const UPLOAD_CONCURRENCY = 4;

function blobUploadContainer(containerUrl: URL): UploadContainer {
  const container = new ContainerClient(containerUrl.toString());
  return {
    async upload(fileName, content, contentType) {
      await container
        .getBlockBlobClient(fileName)
        .uploadStream(content, UPLOAD_BLOCK_SIZE, UPLOAD_CONCURRENCY, {
          blobHTTPHeaders: { blobContentType: contentType },
        });
    },
  };
}

function alternateIdFilter(alternateId: string): string {
  return `properties.alternateId eq '${alternateId.replace(/'/g, "''")}'`;
}

interface AzureMediaClientOptions {
  options: MediaServiceOptions;
  logger?: Logger;
  /** Pre-built management client; `login()` will not replace it. */
  client?: MediaServicesApi;
  credential?: TokenCredential;
  uploadContainerFactory?: UploadContainerFactory;
}

export class AzureMediaClient implements MediaClient {
  private readonly options: MediaServiceOptions;
  private readonly logger: Logger;
  private readonly credential?: TokenCredential;
  private readonly uploadContainerFactory: UploadContainerFactory;
  private session: Promise<MediaServicesApi> | null = null;
  private client: MediaServicesApi | null = null;

  constructor(options: AzureMediaClientOptions) {
    this.options = options.options;
    this.logger = (options.logger ?? pino({ name: "media-client" })).child({
      component: "media-client",
    });
    this.credential = options.credential;
    this.uploadContainerFactory =
      options.uploadContainerFactory ?? blobUploadContainer;
    if (options.client) {
      this.client = options.client;
      this.session = Promise.resolve(options.client);
    }
  }

  /**
   * Acquires the authenticated management client once per process.
   * Concurrent callers share the pending login; a failed login is not cached.
   */
  async login(): Promise<void> {
    if (!this.session) {
      const pending = this.authenticate();
      this.session = pending;
      void pending.catch(() => {
        if (this.session === pending) {
          this.session = null;
        }
      });
    }
    await this.session;
  }

  async createAsset(
    name: string,
    description?: string,
    alternateId?: string
  ): Promise<Asset> {
    this.logger.info({ assetName: name, alternateId }, "Creating asset");
    const asset: Asset = {};
    if (description) {
      asset.description = description;
    }
    if (alternateId) {
      asset.alternateId = alternateId;
    }
    return this.api.assets.createOrUpdate(
      this.options.resourceGroup,
      this.options.accountName,
      name,
      asset
    );
  }

  async getAsset(name: string): Promise<Asset | undefined> {
    try {
      return await this.api.assets.get(
        this.options.resourceGroup,
        this.options.accountName,
        name
      );
    } catch (error) {
      if (isRestError(error) && error.statusCode === 404) {
        return undefined;
      }
      throw error;
    }
  }

  async findAssetByAlternateId(alternateId: string): Promise<Asset | undefined> {
    const assets = this.api.assets.list(
      this.options.resourceGroup,
      this.options.accountName,
      { filter: alternateIdFilter(alternateId), top: 1 }
    );
    for await (const asset of assets) {
      return asset;
    }
    return undefined;
  }

  async deleteAsset(name: string): Promise<void> {
    this.logger.info({ assetName: name }, "Deleting asset");
    await this.api.assets.delete(
      this.options.resourceGroup,
      this.options.accountName,
      name
    );
  }

  async getUploadContainerUrl(assetName: string, expiresAt: Date): Promise<URL> {
    const response = await this.api.assets.listContainerSas(
      this.options.resourceGroup,
      this.options.accountName,
      assetName,
      {
        permissions: KnownAssetContainerPermission.ReadWrite,
        expiryTime: expiresAt,
      }
    );
    const [sasUrl] = response.assetContainerSasUrls ?? [];
    if (!sasUrl) {
      throw new MediaServiceError(
        `No container SAS URL returned for asset ${assetName}`,
        "NO_CONTAINER_URL"
      );
    }
    return new URL(sasUrl);
  }

  async uploadContent(
    containerUrl: URL,
    fileName: string,
    content: Readable
  ): Promise<void> {
    const blobName = basename(fileName);
    // SAS query carries the write token
    this.logger.info(
      { fileName: blobName, container: `${containerUrl.origin}${containerUrl.pathname}` },
      "Uploading file to asset container"
    );
    await this.uploadContainerFactory(containerUrl).upload(
      blobName,
      content,
      VIDEO_CONTENT_TYPE
    );
  }

  async getOrCreateTransform(name: string): Promise<Transform> {
    try {
      return await this.api.transforms.get(
        this.options.resourceGroup,
        this.options.accountName,
        name
      );
    } catch (error) {
      if (!isRestError(error) || error.statusCode !== 404) {
        throw error;
      }
    }

    const outputs: TransformOutput[] = [
      {
        preset: {
          odataType: "#Microsoft.Media.BuiltInStandardEncoderPreset",
          presetName: KnownEncoderNamedPreset.AdaptiveStreaming,
        },
      },
    ];

    this.logger.info({ transformName: name }, "Creating transform");
    return this.api.transforms.createOrUpdate(
      this.options.resourceGroup,
      this.options.accountName,
      name,
      { outputs }
    );
  }

  async submitJob(
    transformName: string,
    jobName: string,
    inputAssetName: string,
    outputAssetNames: string[]
  ): Promise<Job> {
    // Job names are assumed unique; a collision surfaces as a remote error.
    return this.api.jobs.create(
      this.options.resourceGroup,
      this.options.accountName,
      transformName,
      jobName,
      {
        input: {
          odataType: "#Microsoft.Media.JobInputAsset",
          assetName: inputAssetName,
        },
        outputs: outputAssetNames.map((assetName) => ({
          odataType: "#Microsoft.Media.JobOutputAsset" as const,
          assetName,
        })),
      }
    );
  }

  /**
   * Creates a fresh streaming locator for the asset. Errors are logged and
   * reported in the result, never thrown.
   */
  async publishAsset(
    assetName: string,
    streamingPolicyName: string
  ): Promise<PublishResult> {
    const locatorId = randomUUID();
    const locatorName = `streaminglocator-${locatorId}`;

    try {
      const { resourceGroup, accountName } = this.options;
      const asset = await this.getAsset(assetName);
      if (!asset) {
        throw new Error(`Asset ${assetName} not found`);
      }
      await this.api.streamingPolicies.get(
        resourceGroup,
        accountName,
        streamingPolicyName
      );
      await this.api.streamingLocators.create(
        resourceGroup,
        accountName,
        locatorName,
        {
          assetName,
          streamingPolicyName,
          streamingLocatorId: locatorId,
          alternativeMediaId: locatorId,
        }
      );
    } catch (error) {
      if (isRestError(error)) {
        this.logger.error(
          {
            code: error.code,
            statusCode: error.statusCode,
            assetName,
            locatorName,
          },
          `API error ${error.code ?? "unknown"} occurred: ${error.message}`
        );
      } else {
        this.logger.error(
          { err: error, assetName, locatorName },
          "Failed to publish asset"
        );
      }
      return {
        status: "failed",
        assetName,
        locatorName,
        error: error instanceof Error ? error.message : String(error),
      };
    }

    this.logger.info({ locatorName, locatorId }, `Created '${locatorName}'`);
    return { status: "published", assetName, locatorName, locatorId };
  }

  private get api(): MediaServicesApi {
    if (!this.client) {
      throw new MediaServiceError("Media client not logged in", "NOT_LOGGED_IN");
    }
    return this.client;
  }

  private async authenticate(): Promise<MediaServicesApi> {
    const { aadTenantId, aadClientId, aadSecret, armEndpoint, subscriptionId } =
      this.options;
    const endpoint = armEndpoint.toString().replace(/\/+$/, "");

    try {
      const credential =
        this.credential ??
        new ClientSecretCredential(aadTenantId, aadClientId, aadSecret);
      const token = await credential.getToken(`${endpoint}/.default`);
      if (!token) {
        throw new Error("No access token issued");
      }

      const client = new AzureMediaServices(credential, subscriptionId, {
        $host: endpoint,
        endpoint,
      });
      this.client = client;
      this.logger.info({ endpoint, subscriptionId }, "Logged in to media service");
      return client;
    } catch (error) {
      this.logger.error({ err: error, tenantId: aadTenantId }, "Media service login failed");
      throw new MediaAuthenticationError(
        `Media service login failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}
