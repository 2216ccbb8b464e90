/**
 * Gateway Configuration
 *
 * Every setting comes from the environment. `loadGatewayConfig` maps the
 * variables onto a nested object and validates it with zod, so a bad value
 * stops the process at startup instead of failing a request later.
 *
 * Required environment variables:
 * - ANTHROPIC_API_KEY: model provider key
 *
 * Everything else has a default; see `.env.example`.
 */

import { z } from 'zod';
import { DEFAULT_COMPANY_NAME } from '../generation/index.js';
import { LogFormatSchema, LogLevel, LogLevelSchema, parseLogLevel } from '../logging/index.js';
import { StoreDriver } from '../store/index.js';

// =============================================================================
// Schema
// =============================================================================

export const GatewayConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1).default('0.0.0.0'),
    port: z.number().int().min(1).max(65535).default(8000),
    version: z.string().min(1).default('1.0.0'),
    /** Take the client address from X-Forwarded-For */
    trustProxy: z.boolean().default(false),
  }),
  logging: z.object({
    level: LogLevelSchema.default(LogLevel.INFO),
    format: LogFormatSchema.default('json'),
  }),
  auth: z.object({
    /** Accepted API keys; with none configured every request is rejected */
    apiKeys: z.array(z.string().min(1)).default([]),
    headerName: z.string().min(1).default('X-API-Key'),
  }),
  cors: z.object({
    allowedOrigins: z.array(z.string().url()).default(['http://localhost:3000']),
  }),
  store: z.object({
    driver: z.enum([StoreDriver.REDIS, StoreDriver.MEMORY]).default(StoreDriver.REDIS),
    redisUrl: z.string().min(1).default('redis://localhost:6379/0'),
    connectTimeoutMs: z.number().int().positive().default(2000),
  }),
  limits: z.object({
    originDailyLimit: z.number().int().positive().default(200),
    globalDailyLimit: z.number().int().positive().default(2000),
    /** Per-origin requests per minute on the chat routes */
    chatPerMinute: z.number().int().positive().default(20),
    /** Per-origin requests per minute everywhere else */
    defaultPerMinute: z.number().int().positive().default(100),
    maxBodyBytes: z.number().int().positive().default(10 * 1024),
    maxQueryChars: z.number().int().positive().default(1000),
    maxQueryTokens: z.number().int().positive().default(350),
  }),
  cache: z.object({
    ttlSeconds: z.number().int().positive().default(300),
  }),
  retrieval: z.object({
    topK: z.number().int().min(1).max(20).default(3),
    qdrantUrl: z.string().url().default('http://localhost:6333'),
    qdrantApiKey: z.string().min(1).optional(),
    collectionName: z.string().min(1).default('brand-knowledge'),
    labelField: z.string().min(1).default('brand'),
    embeddingUrl: z.string().url().default('http://localhost:8080/v1'),
    embeddingApiKey: z.string().min(1).optional(),
    embeddingModel: z.string().min(1).default('multilingual-e5-large'),
    timeoutMs: z.number().int().positive().default(10000),
  }),
  generation: z.object({
    anthropicApiKey: z.string().min(1, 'ANTHROPIC_API_KEY is required'),
    model: z.string().min(1).default('claude-3-5-haiku-latest'),
    companyName: z.string().min(1).default(DEFAULT_COMPANY_NAME),
    timeoutMs: z.number().int().positive().default(30000),
  }),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

export type Env = Record<string, string | undefined>;

// =============================================================================
// Errors
// =============================================================================

export class ConfigError extends Error {
  readonly issues: Array<{ path: string; message: string }>;

  constructor(issues: Array<{ path: string; message: string }>) {
    super(
      `Invalid configuration:\n${issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')}`
    );
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Build and validate the configuration from environment variables.
 *
 * @throws {ConfigError} listing every invalid or missing value
 *
 * @example
 * ```typescript
 * const config = loadGatewayConfig(process.env);
 * console.log(config.limits.originDailyLimit); // 200
 * ```
 */
export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  const raw = {
    server: {
      host: text(env['HOST']),
      port: integer(env['PORT']),
      version: text(env['APP_VERSION']),
      trustProxy: flag(env['TRUST_PROXY']),
    },
    logging: {
      level: env['LOG_LEVEL'] ? parseLogLevel(env['LOG_LEVEL']) : undefined,
      format: text(env['LOG_FORMAT']),
    },
    auth: {
      apiKeys: list(env['API_KEYS']),
      headerName: text(env['API_KEY_HEADER']),
    },
    cors: {
      allowedOrigins: list(env['ALLOWED_ORIGINS']),
    },
    store: {
      driver: text(env['STORE_DRIVER']),
      redisUrl: text(env['REDIS_URL']),
      connectTimeoutMs: integer(env['REDIS_CONNECT_TIMEOUT_MS']),
    },
    limits: {
      originDailyLimit: integer(env['ORIGIN_DAILY_LIMIT']),
      globalDailyLimit: integer(env['GLOBAL_DAILY_LIMIT']),
      chatPerMinute: integer(env['RATE_LIMIT_PER_MINUTE']),
      defaultPerMinute: integer(env['DEFAULT_RATE_LIMIT_PER_MINUTE']),
      maxBodyBytes: integer(env['MAX_BODY_BYTES']),
      maxQueryChars: integer(env['MAX_QUERY_CHARS']),
      maxQueryTokens: integer(env['MAX_QUERY_TOKENS']),
    },
    cache: {
      ttlSeconds: integer(env['CACHE_TTL_SECONDS']),
    },
    retrieval: {
      topK: integer(env['TOP_K']),
      qdrantUrl: text(env['QDRANT_URL']),
      qdrantApiKey: text(env['QDRANT_API_KEY']),
      collectionName: text(env['QDRANT_COLLECTION']),
      labelField: text(env['LABEL_FIELD']),
      embeddingUrl: text(env['EMBEDDING_API_URL']),
      embeddingApiKey: text(env['EMBEDDING_API_KEY']),
      embeddingModel: text(env['EMBEDDING_MODEL']),
      timeoutMs: integer(env['RETRIEVAL_TIMEOUT_MS']),
    },
    generation: {
      anthropicApiKey: env['ANTHROPIC_API_KEY'] ?? '',
      model: text(env['LLM_MODEL']),
      companyName: text(env['COMPANY_NAME']),
      timeoutMs: integer(env['LLM_TIMEOUT_MS']),
    },
  };

  const result = GatewayConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

// =============================================================================
// Helper Functions
// =============================================================================

function text(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Unset stays undefined so the default applies; anything else is handed to
 * zod as a number, and NaN fails validation.
 */
function integer(value: string | undefined): number | undefined {
  const trimmed = text(value);
  return trimmed === undefined ? undefined : Number(trimmed);
}

function flag(value: string | undefined): boolean | undefined {
  const trimmed = text(value);
  if (trimmed === undefined) return undefined;
  return ['1', 'true', 'yes', 'on'].includes(trimmed.toLowerCase());
}

function list(value: string | undefined): string[] | undefined {
  const trimmed = text(value);
  if (trimmed === undefined) return undefined;
  return trimmed
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
