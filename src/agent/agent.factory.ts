/**
 * Composition root: wires configuration, providers, stores and sinks into a
 * PipelineOrchestrator. Explicit collaborators in the options win over the
 * ones built from configuration.
 */

import type pg from 'pg';
import type { Redis } from 'ioredis';
import type { Config } from '../config/index.js';
import { config as defaultConfig } from '../config/index.js';
import type { PolicyConfig } from '../config/policy.js';
import { createPolicyConfig, policyOverridesFromConfig } from '../config/policy.js';
import type { ProviderRegistry } from '../llm/types.js';
import { configuredProviders, createProviderRegistry } from '../llm/router.js';
import { ModelRouter } from '../llm/model-router.service.js';
import { OpenAIEmbedder } from '../llm/embedding.service.js';
import { InputAnalyzer } from '../analysis/input-analysis.service.js';
import { SafetyGate } from '../safety/safety-gate.service.js';
import { ReasoningEngine } from '../reasoning/reasoning-engine.service.js';
import type { ResponseParser } from '../reasoning/reasoning.types.js';
import type { RetrievalResult } from '../types/index.js';
import type { KnowledgeSource } from '../retrieval/retrieval.types.js';
import { retrievalResultSchema } from '../retrieval/retrieval.types.js';
import { RetrievalScorer } from '../retrieval/retrieval-scorer.service.js';
import { KnowledgeSearch } from '../retrieval/knowledge-search.service.js';
import { PgVectorKnowledgeStore } from '../retrieval/pgvector.store.js';
import type { CacheManager } from '../cache/cache.types.js';
import { MemoryCache } from '../cache/memory-cache.js';
import { RedisCache } from '../cache/redis-cache.js';
import type { ImageSource } from '../images/image-search.service.js';
import { CatalogImageSource } from '../images/image-search.service.js';
import type { ContextStore } from '../context/context.types.js';
import { MemoryContextStore } from '../context/memory-context.store.js';
import { RedisContextStore } from '../context/redis-context.store.js';
import type { TelemetrySink } from '../telemetry/telemetry.types.js';
import { LogTelemetrySink } from '../telemetry/log.sink.js';
import { PostgresTelemetrySink } from '../telemetry/postgres.sink.js';
import { closePool, createPool } from '../db/postgres.js';
import { createRedisClient } from '../db/redis.js';
import { PipelineOrchestrator } from './pipeline-orchestrator.service.js';
import type { Capability, PipelineHooks } from './agent.types.js';
import { absent, capabilityOf, present } from './agent.types.js';
import { errorMessage } from '../errors/index.js';
import logger from '../utils/logger.js';

export interface AgentOptions {
  config?: Config;
  policy?: PolicyConfig;
  providers?: ProviderRegistry;
  /** null disables the capability; undefined builds it from configuration */
  knowledge?: KnowledgeSource | null;
  images?: ImageSource | null;
  context?: ContextStore | null;
  telemetry?: TelemetrySink | null;
  parser?: ResponseParser;
  hooks?: PipelineHooks;
}

export interface Agent {
  orchestrator: PipelineOrchestrator;
  policy: PolicyConfig;
  router: ModelRouter;
  /** Releases the database pool and Redis connection, if any were opened */
  close(): Promise<void>;
}

export function createAgent(options: AgentOptions = {}): Agent {
  const config = options.config ?? defaultConfig;
  const policy = options.policy ?? createPolicyConfig(policyOverridesFromConfig(config));
  const providers = options.providers ?? createProviderRegistry(config);

  const configured = configuredProviders(providers);
  const router = new ModelRouter(policy.routing, {
    google: configured.includes('google'),
    openai: configured.includes('openai'),
  });
  if (configured.length === 0) {
    logger.warn('No LLM provider configured; reasoning will fail until an API key is set');
  }

  let pool: pg.Pool | null = null;
  const getPool = (): pg.Pool => {
    pool ??= createPool(config.postgres);
    return pool;
  };

  let redis: Redis | null = null;
  const getRedis = (): Redis | null => {
    if (!config.redis.enabled) return null;
    redis ??= createRedisClient(config.redis);
    return redis;
  };

  const knowledge =
    options.knowledge !== undefined
      ? capabilityOf(options.knowledge)
      : config.agent.knowledgeEnabled && config.openai.apiKey
        ? present(buildKnowledgeSearch(config, policy, getPool(), getRedis()))
        : absent<KnowledgeSource>();

  const images = options.images !== undefined ? capabilityOf(options.images) : present<ImageSource>(new CatalogImageSource());

  const context =
    options.context !== undefined ? capabilityOf(options.context) : present<ContextStore>(buildContextStore(getRedis()));

  const telemetry =
    options.telemetry !== undefined ? capabilityOf(options.telemetry) : buildTelemetrySink(config, getPool);

  const orchestrator = new PipelineOrchestrator({
    policy,
    analyzer: new InputAnalyzer(),
    safetyGate: new SafetyGate(policy.safety),
    reasoner: new ReasoningEngine({
      router,
      providers,
      routing: policy.routing,
      safety: policy.safety,
      parser: options.parser,
    }),
    knowledge,
    images,
    context,
    telemetry,
    providers: () => router.availableProviders(),
    hooks: options.hooks,
  });

  logger.info('Care agent initialized', {
    providers: configured,
    preferredProvider: policy.routing.preferredProvider,
    capabilities: orchestrator.status().capabilities,
  });

  return {
    orchestrator,
    policy,
    router,
    async close() {
      const closing: Promise<unknown>[] = [];
      if (pool) closing.push(closePool(pool));
      if (redis) closing.push(redis.quit());
      const results = await Promise.allSettled(closing);
      for (const result of results) {
        if (result.status === 'rejected') {
          logger.warn('Error while closing agent resources', { error: errorMessage(result.reason) });
        }
      }
    },
  };
}

function buildKnowledgeSearch(
  config: Config,
  policy: PolicyConfig,
  pool: pg.Pool,
  redis: Redis | null
): KnowledgeSearch {
  const embedder = new OpenAIEmbedder({ apiKey: config.openai.apiKey, model: config.openai.embeddingModel });
  const cache: CacheManager<RetrievalResult> = redis
    ? new RedisCache<RetrievalResult>(redis, { schema: retrievalResultSchema })
    : new MemoryCache<RetrievalResult>();

  return new KnowledgeSearch(
    new PgVectorKnowledgeStore(pool, embedder),
    new RetrievalScorer(policy.retrieval),
    policy.retrieval,
    cache
  );
}

function buildContextStore(redis: Redis | null): ContextStore {
  return redis ? new RedisContextStore(redis) : new MemoryContextStore();
}

function buildTelemetrySink(config: Config, getPool: () => pg.Pool): Capability<TelemetrySink> {
  switch (config.agent.telemetrySink) {
    case 'postgres':
      return present<TelemetrySink>(new PostgresTelemetrySink(getPool()));
    case 'log':
      return present<TelemetrySink>(new LogTelemetrySink(config.agent.detailedLogging));
    case 'none':
      return absent<TelemetrySink>();
  }
}

export default createAgent;
