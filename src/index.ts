import Fastify from 'fastify';
import type { Knex } from 'knex';
import { Redis as IORedis } from 'ioredis';
import OpenAI from 'openai';
import { config } from './config.js';
import { logger } from './utils/logger.js';
import { healthRoutes } from './routes/health.js';
import { queryRoutes } from './routes/query.js';
import { registerErrorHandler } from './middleware/errorHandler.js';
import { createReadonlyDb, createConnectionProvider } from './db/readonlyConnection.js';
import { createRedisCacheBackend } from './db/redisCacheBackend.js';
import { createResultCache } from './ai/resultCache.js';
import { createQueryExecutor } from './ai/queryExecutor.js';
import { createFileProvider } from './services/fileProvider.js';
import { createInferenceService } from './services/inferenceService.js';
import { createAnalysisService } from './services/analysisService.js';

// Hard deadline sits just past the server-side statement timeout
const EXECUTION_DEADLINE_MARGIN_MS = 1000;

const startTime = Date.now();

const fastify = Fastify({
  logger: false,
  requestIdHeader: 'x-request-id',
  genReqId: () => crypto.randomUUID(),
});

// Read-only databases, one pool per connection reference
const databases: Record<string, Knex> = {};
for (const [name, url] of Object.entries(config.database.connections)) {
  databases[name] = createReadonlyDb(url, {
    poolMin: config.database.poolMin,
    poolMax: config.database.poolMax,
    acquireTimeoutMs: config.database.acquireTimeoutMs,
    statementTimeoutMs: config.database.statementTimeoutMs,
  });
}

// Redis
const redis = new IORedis(config.redis.url, {
  maxRetriesPerRequest: 3,
  retryStrategy(times: number) {
    if (times > 3) return null;
    return Math.min(times * 200, 2000);
  },
});

// Request logging
fastify.addHook('onRequest', async (request) => {
  logger.info({ requestId: request.id, method: request.method, url: request.url }, 'Request received');
});

fastify.addHook('onResponse', async (request, reply) => {
  logger.info(
    { requestId: request.id, method: request.method, url: request.url, statusCode: reply.statusCode },
    'Request completed',
  );
});

// Error handler
registerErrorHandler(fastify);

// Services
const connectionProvider = createConnectionProvider({ databases });
const queryExecutor = createQueryExecutor({
  connectionProvider,
  maxRows: config.query.maxRows,
  timeoutMs: config.database.statementTimeoutMs + EXECUTION_DEADLINE_MARGIN_MS,
});
const resultCache = createResultCache({
  backend: createRedisCacheBackend(redis),
  memoryMaxEntries: config.cache.memoryMaxEntries,
  defaultTtlSeconds: config.cache.ttlSeconds,
});
const fileProvider = createFileProvider({
  uploadDir: config.files.uploadDir,
  maxBytes: config.files.maxBytes,
});
const openai = new OpenAI({ apiKey: config.openai.apiKey });
const inference = createInferenceService({
  openai,
  model: config.openai.model,
  timeoutMs: config.openai.timeoutMs,
});
const analysisService = createAnalysisService({
  cache: resultCache,
  fileProvider,
  connectionProvider,
  executor: queryExecutor,
  inference,
  chunkSize: config.analysis.chunkSize,
  maxRows: config.query.maxRows,
  cacheTtlSeconds: config.cache.ttlSeconds,
});

// Routes
await fastify.register(
  async (instance) => healthRoutes(instance, { databases, redis, startTime }),
);

await fastify.register(
  async (instance) => queryRoutes(instance, { analysisService }),
);

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down gracefully...');
  await fastify.close();
  await Promise.all(Object.values(databases).map((db) => db.destroy()));
  redis.disconnect();
  logger.info('Server shut down');
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Start
try {
  await fastify.listen({ port: config.port, host: config.host });
  logger.info(
    { port: config.port, host: config.host, connections: Object.keys(databases) },
    'Server started',
  );
} catch (err) {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
}

export { fastify, databases, redis };
