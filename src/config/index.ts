import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((value) =>
    value && value.trim().length > 0 ? value : undefined
  );

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  HTTP_HOST: z.string().default("0.0.0.0"),
  HTTP_PORT: z.coerce.number().int().positive().default(7071),
  HTTP_BODY_LIMIT: z.coerce.number().int().positive().default(1_048_576),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),

  // Service principal, see `az ams account sp create`
  MEDIA_SERVICES_AAD_TENANT_ID: z.string().min(1),
  MEDIA_SERVICES_ARM_ENDPOINT: z
    .string()
    .url()
    .default("https://management.azure.com/"),
  MEDIA_SERVICES_AAD_CLIENT_ID: z.string().min(1),
  MEDIA_SERVICES_AAD_SECRET: z.string().min(1),
  MEDIA_SERVICES_SUBSCRIPTION_ID: z.string().min(1),
  MEDIA_SERVICES_RESOURCE_GROUP: z.string().min(1),
  MEDIA_SERVICES_ACCOUNT_NAME: z.string().min(1),

  MEDIA_TRANSFORM_NAME: z
    .string()
    .min(1)
    .default("Content Adaptive Multiple Bitrate MP4"),
  MEDIA_STREAMING_POLICY: z
    .string()
    .min(1)
    .default("Predefined_ClearStreamingOnly"),
  UPLOAD_SAS_TTL_MINUTES: z.coerce.number().int().positive().default(60),

  INGEST_STORAGE_CONNECTION_STRING: optionalString,
  INGEST_CONTAINER: z.string().min(1).default("ingest"),

  METRICS_ACCESS_TOKEN: optionalString,
  OTEL_TRACES_ENDPOINT: z
    .string()
    .url()
    .optional()
    .transform((value) =>
      value && value.trim().length > 0 ? value : undefined
    ),
  OTEL_METRICS_ENDPOINT: z
    .string()
    .url()
    .optional()
    .transform((value) =>
      value && value.trim().length > 0 ? value : undefined
    ),
  OTEL_METRICS_INTERVAL_MS: z.coerce.number().int().positive().default(15000),
});

export type Env = z.infer<typeof envSchema>;

/**
 * The `MediaServices` settings block consumed by the media client.
 */
export interface MediaServiceOptions {
  aadTenantId: string;
  armEndpoint: URL;
  aadClientId: string;
  aadSecret: string;
  subscriptionId: string;
  resourceGroup: string;
  accountName: string;
}

export function getMediaServiceOptions(config: Env): MediaServiceOptions {
  return {
    aadTenantId: config.MEDIA_SERVICES_AAD_TENANT_ID,
    armEndpoint: new URL(config.MEDIA_SERVICES_ARM_ENDPOINT),
    aadClientId: config.MEDIA_SERVICES_AAD_CLIENT_ID,
    aadSecret: config.MEDIA_SERVICES_AAD_SECRET,
    subscriptionId: config.MEDIA_SERVICES_SUBSCRIPTION_ID,
    resourceGroup: config.MEDIA_SERVICES_RESOURCE_GROUP,
    accountName: config.MEDIA_SERVICES_ACCOUNT_NAME,
  };
}

export function parseConfig(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`MediaEncodingService configuration invalid: ${message}`);
  }
  return parsed.data;
}

let cachedConfig: Env | null = null;

export function loadConfig(): Env {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = parseConfig(process.env);
  return cachedConfig;
}

export function resetConfigCache() {
  cachedConfig = null;
}
