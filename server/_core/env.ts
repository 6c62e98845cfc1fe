import { z } from "zod";

export type Environment = "development" | "test" | "production" | (string & {});
export type StorageMode = "local" | "remote";

export interface RemoteStorageSettings {
  endpointUrl: string | undefined;
  region: string;
  bucket: string | undefined;
  accessKeyId: string | undefined;
  secretAccessKey: string | undefined;
  /** Public base URL that already includes the bucket, e.g. a CDN host. */
  cdnBaseUrl: string | undefined;
}

export interface StorageSettings {
  /** Explicit STORAGE_MODE; when absent the mode is derived from the environment. */
  mode: StorageMode | undefined;
  remote: RemoteStorageSettings;
}

export interface AppConfig {
  environment: Environment;
  isProduction: boolean;
  port: number;
  databaseUrl: string;
  secretKey: string;
  uploadDir: string;
  storage: StorageSettings;
}

const DEV_SECRET_KEY = "dev_secret_key_change_in_production";

// Deployment dashboards often export unset variables as "", so treat them as missing.
const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const schema = z.object({
  ENVIRONMENT: optionalString.transform((value) => value?.toLowerCase() ?? "development"),
  PORT: optionalString.pipe(z.coerce.number().int().positive().default(3000)),
  DATABASE_URL: optionalString,
  SECRET_KEY: optionalString,
  UPLOAD_DIR: optionalString.transform((value) => value ?? "static/uploads"),
  STORAGE_MODE: optionalString.pipe(z.enum(["local", "remote"]).optional()),
  S3_ENDPOINT_URL: optionalString.pipe(z.string().url().optional()),
  S3_REGION: optionalString.transform((value) => value ?? "us-east-1"),
  S3_BUCKET: optionalString,
  S3_ACCESS_KEY: optionalString,
  S3_SECRET_KEY: optionalString,
  S3_CDN_URL: optionalString.pipe(z.string().url().optional()),
});

/**
 * Read and validate the process configuration. Call once at startup and pass
 * the result to whatever needs it.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment variables: ${message}`);
  }

  const env = parsed.data;
  const config: AppConfig = {
    environment: env.ENVIRONMENT,
    isProduction: env.ENVIRONMENT === "production",
    port: env.PORT,
    databaseUrl: env.DATABASE_URL ?? "",
    secretKey: env.SECRET_KEY ?? (env.ENVIRONMENT === "development" ? DEV_SECRET_KEY : ""),
    uploadDir: env.UPLOAD_DIR,
    storage: {
      mode: env.STORAGE_MODE,
      remote: {
        endpointUrl: env.S3_ENDPOINT_URL,
        region: env.S3_REGION,
        bucket: env.S3_BUCKET,
        accessKeyId: env.S3_ACCESS_KEY,
        secretAccessKey: env.S3_SECRET_KEY,
        cdnBaseUrl: env.S3_CDN_URL,
      },
    },
  };
  return Object.freeze(config);
}

export interface ConfigReport {
  fatal: string[];
  warnings: string[];
}

/** Collect startup problems. The caller decides whether to exit. */
export function validateConfig(config: AppConfig, storageMode: StorageMode): ConfigReport {
  const fatal: string[] = [];
  const warnings: string[] = [];

  if (!config.secretKey) fatal.push("SECRET_KEY is required outside development");
  if (!config.databaseUrl) fatal.push("DATABASE_URL is required");

  if (config.environment !== "development" && config.secretKey === DEV_SECRET_KEY) {
    warnings.push("SECRET_KEY is still the development default");
  }

  if (storageMode === "remote") {
    const { remote } = config.storage;
    const missing = [
      !remote.accessKeyId && "S3_ACCESS_KEY",
      !remote.secretAccessKey && "S3_SECRET_KEY",
      !remote.bucket && "S3_BUCKET",
    ].filter((name): name is string => typeof name === "string");
    if (missing.length > 0) {
      warnings.push(`Remote photo storage is selected but ${missing.join(", ")} not set; uploads will fail`);
    }
  }

  return { fatal, warnings };
}
