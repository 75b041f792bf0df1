import { CodeAnalyzer } from '../shared/analyzer.js';
import { MemoryCacheBackend } from '../shared/cache.js';
import { CacheFacade } from '../shared/cache-facade.js';
import { loadConfig, type AppConfig } from '../shared/config.js';
import { GracefulDegradationManager } from '../shared/degradation.js';
import { CacheUnavailableError, PersistenceError, describeCause } from '../shared/errors.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { MetricsCollector } from '../shared/metrics.js';
import { RuleEngine } from '../shared/rule-engine.js';
import type { HistoryStore, ReportEnricher } from '../shared/types.js';
import { ModelReportEnricher } from './enrichment.js';
import { SqliteHistoryStore } from './history.js';
import { createModelProvider } from './providers/registry.js';
import type { FetchLike } from './providers/types.js';
import { IORedisClient, RedisCacheBackend, type KeyValueClient } from './redis-backend.js';
import { createRuleSet } from './rules/index.js';

const FALLBACK_SWEEP_INTERVAL_MS = 60_000;

export interface Services {
  config: Readonly<AppConfig>;
  logger: Logger;
  analyzer: CodeAnalyzer;
  cache: CacheFacade;
  history: HistoryStore | null;
  /** Flushes pending history writes and closes every connection. */
  shutdown(): Promise<void>;
}

export interface CreateServicesOptions {
  config?: Readonly<AppConfig>;
  logger?: Logger;
  /** Overrides the Redis connection built from `redisUrl`. */
  keyValueClient?: KeyValueClient | null;
  fetchImpl?: FetchLike;
}

/**
 * Wires the analyzer and its collaborators from configuration. Optional
 * components that fail to start leave the service degraded, never down.
 */
export async function createServices(options: CreateServicesOptions = {}): Promise<Services> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config.logLevel);
  const metrics = new MetricsCollector();
  const degradation = new GracefulDegradationManager(logger);

  const fallback = new MemoryCacheBackend({
    maxEntries: config.cache.fallbackMaxEntries,
    cleanupIntervalMs: FALLBACK_SWEEP_INTERVAL_MS
  });

  const client = options.keyValueClient !== undefined
    ? options.keyValueClient
    : await connectRedis(config, logger, degradation);
  const primary = client ? new RedisCacheBackend(client, { logger }) : null;

  const cache = new CacheFacade({
    primary,
    fallback,
    ttlMs: config.cache.ttlSeconds * 1000,
    leaseTtlMs: config.cache.leaseTtlMs,
    leasePollIntervalMs: config.cache.leasePollIntervalMs,
    logger,
    metrics,
    degradation
  });

  const history = openHistory(config, logger, degradation);
  const enricher = createEnricher(config, logger, options.fetchImpl);

  const ruleEngine = new RuleEngine(createRuleSet(config.rules), logger);
  const analyzer = new CodeAnalyzer({
    ruleEngine,
    cache,
    history,
    enricher,
    persistSnippets: config.history.persistSnippets,
    logger,
    metrics,
    degradation
  });

  logger.info(`✅ Loaded ${ruleEngine.size} analysis rules`, {
    cache: primary ? primary.name : 'memory only',
    history: history ? config.history.databasePath : 'disabled',
    model: enricher ? `${enricher.provider}/${enricher.model}` : 'none'
  });

  return {
    config,
    logger,
    analyzer,
    cache,
    history,
    async shutdown() {
      await analyzer.drain();
      fallback.stopCleanupTimer();
      history?.close();
      if (client) {
        await client.close();
      }
      logger.info('👋 Services stopped');
    }
  };
}

async function connectRedis(
  config: Readonly<AppConfig>,
  logger: Logger,
  degradation: GracefulDegradationManager
): Promise<KeyValueClient | null> {
  if (!config.redisUrl) {
    logger.info('ℹ️ REDIS_URL not set, using the in-process cache only');
    return null;
  }

  const client = new IORedisClient(config.redisUrl, { logger });
  try {
    await client.connect();
    logger.info('🔗 Connected to Redis');
  } catch (error) {
    // The client keeps reconnecting in the background; the breaker decides when to try it again.
    const failure = new CacheUnavailableError(`Redis connection failed: ${describeCause(error)}`, 'redis', error);
    degradation.handleError(failure);
    logger.warn(`⚠️ ${failure.getUserFriendlyMessage()}`);
  }
  return client;
}

function openHistory(
  config: Readonly<AppConfig>,
  logger: Logger,
  degradation: GracefulDegradationManager
): HistoryStore | null {
  const databasePath = config.history.databasePath;
  if (!databasePath) return null;

  try {
    return new SqliteHistoryStore({ path: databasePath, logger });
  } catch (error) {
    const failure = error instanceof PersistenceError
      ? error
      : new PersistenceError(describeCause(error), error);
    degradation.handleError(failure);
    logger.error(`❌ ${failure.message}`);
    return null;
  }
}

function createEnricher(
  config: Readonly<AppConfig>,
  logger: Logger,
  fetchImpl: FetchLike | undefined
): ReportEnricher | null {
  const provider = createModelProvider(config, fetchImpl);
  return provider ? new ModelReportEnricher(provider, { logger }) : null;
}
