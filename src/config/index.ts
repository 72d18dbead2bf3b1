import { z } from 'zod';
import dotenv from 'dotenv';
import { getOptionalSecret } from '../utils/secrets.js';

dotenv.config();

// z.coerce.boolean() turns the string "false" into true, so env flags are parsed explicitly
const envBoolean = (fallback: boolean) =>
  z.preprocess(
    (value) => (value === undefined || value === '' ? undefined : String(value).toLowerCase() === 'true'),
    z.boolean().default(fallback)
  );

const providerIdSchema = z.enum(['google', 'openai']);

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),
  }),

  postgres: z.object({
    host: z.string().default('localhost'),
    port: z.coerce.number().default(5432),
    user: z.string().default('care_agent'),
    password: z.string().default(''),
    database: z.string().default('care_agent'),
    sslEnabled: envBoolean(false),
    maxConnections: z.coerce.number().int().positive().default(10),
  }),

  redis: z.object({
    enabled: envBoolean(false),
    host: z.string().default('localhost'),
    port: z.coerce.number().default(6379),
    password: z.string().optional(),
  }),

  openai: z.object({
    apiKey: z.string().default(''),
    embeddingModel: z.string().default('text-embedding-3-small'),
  }),

  google: z.object({
    apiKey: z.string().default(''),
  }),

  agent: z.object({
    preferredProvider: providerIdSchema.default('google'),
    temperature: z.coerce.number().min(0).max(2).default(0.3),
    maxTokens: z.coerce.number().int().positive().default(2000),
    confidenceThreshold: z.coerce.number().min(0).max(1).default(0.7),
    maxResults: z.coerce.number().int().positive().default(5),
    cacheTtlSeconds: z.coerce.number().int().positive().default(3600),
    detailedLogging: envBoolean(true),
    telemetrySink: z.enum(['log', 'postgres', 'none']).default('log'),
    knowledgeEnabled: envBoolean(true),
  }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse configuration from an environment record. Secrets are read from
 * Docker secrets first, then from the matching environment variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    nodeEnv: env.NODE_ENV,

    logging: {
      level: env.LOG_LEVEL || undefined,
    },

    postgres: {
      host: env.POSTGRES_HOST,
      port: env.POSTGRES_PORT,
      user: env.POSTGRES_USER,
      password: getOptionalSecret('postgres_password', 'POSTGRES_PASSWORD', env),
      database: env.POSTGRES_DB,
      sslEnabled: env.POSTGRES_SSL_ENABLED,
      maxConnections: env.POSTGRES_MAX_CONNECTIONS,
    },

    redis: {
      enabled: env.REDIS_ENABLED,
      host: env.REDIS_HOST,
      port: env.REDIS_PORT,
      password: getOptionalSecret('redis_password', 'REDIS_PASSWORD', env),
    },

    openai: {
      apiKey: getOptionalSecret('openai_api_key', 'OPENAI_API_KEY', env),
      embeddingModel: env.OPENAI_EMBEDDING_MODEL,
    },

    google: {
      apiKey: getOptionalSecret('google_api_key', 'GOOGLE_API_KEY', env),
    },

    agent: {
      preferredProvider: env.PREFERRED_PROVIDER || undefined,
      temperature: env.LLM_TEMPERATURE,
      maxTokens: env.LLM_MAX_TOKENS,
      confidenceThreshold: env.RETRIEVAL_CONFIDENCE_THRESHOLD,
      maxResults: env.RETRIEVAL_MAX_RESULTS,
      cacheTtlSeconds: env.CACHE_TTL_SECONDS,
      detailedLogging: env.DETAILED_LOGGING,
      telemetrySink: env.TELEMETRY_SINK || undefined,
      knowledgeEnabled: env.KNOWLEDGE_ENABLED,
    },
  };

  return configSchema.parse(rawConfig);
}

export const config = loadConfig();
