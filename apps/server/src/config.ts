import {
  MAX_PUBLISH_ATTEMPTS,
  MEDIA_UPLOAD_TIMEOUT_MS,
  PUBLISH_RETRY_DELAY_MS,
  PUBLISH_TASK_TIME_LIMIT_MS,
  TEXT_PUBLISH_TIMEOUT_MS,
} from '@social-publisher/shared';

const DEFAULT_PORT = 3000;
const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_SQLITE_URL = 'file:./data/dev.db';
const DEFAULT_REDIS_URL = 'redis://127.0.0.1:6379';
const DEFAULT_OPENAI_MODEL = 'gpt-4.1-mini';
const DEFAULT_OPENAI_IMAGE_MODEL = 'gpt-image-1';
const DEFAULT_META_GRAPH_VERSION = 'v21.0';
const DEFAULT_TIKTOK_API_URL = 'http://127.0.0.1:8001';
const DEFAULT_WHATSAPP_API_URL = 'https://gate.whapi.cloud';
const DEFAULT_MEDIA_DIR = 'temp_images';
const DEFAULT_WORKER_CONCURRENCY = 4;

export type Env = Record<string, string | undefined>;

export interface MetaConfig {
  graphVersion: string;
  pageId: string | null;
  pageAccessToken: string | null;
  instagramAccountId: string | null;
  instagramAccessToken: string | null;
}

export interface LinkedInConfig {
  accessToken: string | null;
  authorUrn: string | null;
}

export interface TikTokConfig {
  apiUrl: string;
}

export interface WhatsAppConfig {
  apiUrl: string;
  token: string | null;
}

export interface OpenAiConfig {
  apiKey: string | null;
  model: string;
  imageModel: string;
}

export interface MediaConfig {
  // Directory holding uploaded and generated files, served under `/${dir}`
  dir: string;
  publicBaseUrl: string;
}

export interface PublishingConfig {
  maxAttempts: number;
  retryDelayMs: number;
  taskTimeLimitMs: number;
  mediaUploadTimeoutMs: number;
  textTimeoutMs: number;
  workerConcurrency: number;
  runWorker: boolean;
}

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  databaseUrl: string;
  redisUrl: string;
  apiAuthToken: string | null;
  openai: OpenAiConfig;
  meta: MetaConfig;
  linkedin: LinkedInConfig;
  tiktok: TikTokConfig;
  whatsapp: WhatsAppConfig;
  media: MediaConfig;
  publishing: PublishingConfig;
}

function readString(env: Env, key: string): string | null {
  const value = env[key];
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key);
  if (!raw) return fallback;
  return !['0', 'false', 'no', 'off'].includes(raw.toLowerCase());
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

/**
 * Builds the process configuration once. Everything downstream receives the
 * resulting object instead of reading the environment.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const port = readPositiveInt(env, 'PORT', DEFAULT_PORT);

  return {
    port,
    host: readString(env, 'HOST') ?? DEFAULT_HOST,
    nodeEnv: readString(env, 'NODE_ENV') ?? 'development',
    databaseUrl: readString(env, 'DATABASE_URL') ?? DEFAULT_SQLITE_URL,
    redisUrl: readString(env, 'REDIS_URL') ?? DEFAULT_REDIS_URL,
    apiAuthToken: readString(env, 'API_AUTH_TOKEN'),
    openai: {
      apiKey: readString(env, 'OPENAI_API_KEY'),
      model: readString(env, 'OPENAI_MODEL') ?? DEFAULT_OPENAI_MODEL,
      imageModel: readString(env, 'OPENAI_IMAGE_MODEL') ?? DEFAULT_OPENAI_IMAGE_MODEL,
    },
    meta: {
      graphVersion: readString(env, 'META_GRAPH_API_VERSION') ?? DEFAULT_META_GRAPH_VERSION,
      pageId: readString(env, 'FACEBOOK_PAGE_ID'),
      pageAccessToken: readString(env, 'FACEBOOK_PAGE_ACCESS_TOKEN'),
      instagramAccountId: readString(env, 'INSTAGRAM_ACCOUNT_ID'),
      instagramAccessToken:
        readString(env, 'INSTAGRAM_ACCESS_TOKEN') ?? readString(env, 'FACEBOOK_PAGE_ACCESS_TOKEN'),
    },
    linkedin: {
      accessToken: readString(env, 'LINKEDIN_ACCESS_TOKEN'),
      authorUrn: readString(env, 'LINKEDIN_AUTHOR_URN'),
    },
    tiktok: {
      apiUrl: trimTrailingSlash(readString(env, 'TIKTOK_API_URL') ?? DEFAULT_TIKTOK_API_URL),
    },
    whatsapp: {
      apiUrl: trimTrailingSlash(readString(env, 'WHATSAPP_API_URL') ?? DEFAULT_WHATSAPP_API_URL),
      token: readString(env, 'WHATSAPP_TOKEN'),
    },
    media: {
      dir: readString(env, 'MEDIA_DIR') ?? DEFAULT_MEDIA_DIR,
      publicBaseUrl: trimTrailingSlash(readString(env, 'PUBLIC_BASE_URL') ?? `http://localhost:${port}`),
    },
    publishing: {
      maxAttempts: readPositiveInt(env, 'PUBLISH_MAX_ATTEMPTS', MAX_PUBLISH_ATTEMPTS),
      retryDelayMs: readPositiveInt(env, 'PUBLISH_RETRY_DELAY_MS', PUBLISH_RETRY_DELAY_MS),
      taskTimeLimitMs: readPositiveInt(env, 'PUBLISH_TASK_TIMEOUT_MS', PUBLISH_TASK_TIME_LIMIT_MS),
      mediaUploadTimeoutMs: MEDIA_UPLOAD_TIMEOUT_MS,
      textTimeoutMs: TEXT_PUBLISH_TIMEOUT_MS,
      workerConcurrency: readPositiveInt(env, 'PUBLISH_WORKER_CONCURRENCY', DEFAULT_WORKER_CONCURRENCY),
      runWorker: readBoolean(env, 'RUN_PUBLISH_WORKER', true),
    },
  };
}
