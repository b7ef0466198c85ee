import dotenv from 'dotenv';

dotenv.config();

export type SmallVariantSource = 'normal' | 'large';

export interface PipelineConfig {
  conversionWorkers: number;
  uploadWorkers: number;
  dpi: number;
  smallVariantSource: SmallVariantSource;
}

export interface StorageConfig {
  endPoint: string;
  port: number;
  useSSL: boolean;
  accessKey: string;
  secretKey: string;
  bucket: string;
  region: string;
}

export interface AuthConfig {
  jwksUri?: string;
  issuer?: string;
  audience?: string;
}

export interface AppConfig {
  port: number;
  scratchDir: string;
  ghostscriptBin: string;
  imagemagickBin: string;
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
  pipeline: PipelineConfig;
  storage: StorageConfig;
  auth: AuthConfig;
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be an integer >= 1, got "${raw}"`);
  }
  return value;
}

function optional(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function smallSource(env: Env): SmallVariantSource {
  const raw = env.SMALL_VARIANT_SOURCE || 'normal';
  if (raw !== 'normal' && raw !== 'large') {
    throw new Error(`SMALL_VARIANT_SOURCE must be "normal" or "large", got "${raw}"`);
  }
  return raw;
}

/**
 * Build the service configuration from environment variables.
 * Throws on invalid values so the process fails at startup.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: positiveInt(env, 'PORT', 8080),
    scratchDir: env.SCRATCH_DIR || '/tmp/conversions',
    ghostscriptBin: env.GHOSTSCRIPT_BIN || 'gs',
    imagemagickBin: env.IMAGEMAGICK_BIN || 'convert',
    rateLimitWindowMs: positiveInt(env, 'RATE_LIMIT_WINDOW_MS', 60000),
    rateLimitMaxRequests: positiveInt(env, 'RATE_LIMIT_MAX_REQUESTS', 100),
    pipeline: {
      conversionWorkers: positiveInt(env, 'CONVERSION_WORKERS', 2),
      uploadWorkers: positiveInt(env, 'UPLOAD_WORKERS', 10),
      dpi: positiveInt(env, 'RASTER_DPI', 300),
      smallVariantSource: smallSource(env)
    },
    storage: {
      endPoint: env.MINIO_ENDPOINT || 'minio',
      port: positiveInt(env, 'MINIO_PORT', 9000),
      useSSL: env.MINIO_USE_SSL === 'true',
      accessKey: env.MINIO_ACCESS_KEY || 'minioadmin',
      secretKey: env.MINIO_SECRET_KEY || 'minioadmin',
      bucket: env.MINIO_BUCKET || 'page-renders',
      region: env.MINIO_REGION || 'us-east-1'
    },
    auth: {
      jwksUri: optional(env, 'AUTH_JWKS_URI'),
      issuer: optional(env, 'AUTH_ISSUER'),
      audience: optional(env, 'AUTH_AUDIENCE')
    }
  };
}

export const config = loadConfig();
