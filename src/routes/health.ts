import type { FastifyInstance } from 'fastify';
import type { Knex } from 'knex';
import type { Redis } from 'ioredis';

interface HealthDeps {
  databases: Record<string, Knex>;
  redis: Redis;
  startTime: number;
}

type ComponentStatus = 'connected' | 'disconnected';

export async function healthRoutes(fastify: FastifyInstance, deps: HealthDeps) {
  fastify.get('/health', async (_request, reply) => {
    const connections: Record<string, ComponentStatus> = {};

    for (const [name, db] of Object.entries(deps.databases)) {
      try {
        await db.raw('SELECT 1');
        connections[name] = 'connected';
      } catch {
        connections[name] = 'disconnected';
      }
    }

    let redisStatus: ComponentStatus = 'disconnected';
    try {
      const pong = await deps.redis.ping();
      redisStatus = pong === 'PONG' ? 'connected' : 'disconnected';
    } catch {
      redisStatus = 'disconnected';
    }

    const isHealthy =
      redisStatus === 'connected' &&
      Object.values(connections).every((status) => status === 'connected');

    return reply.status(isHealthy ? 200 : 503).send({
      status: isHealthy ? 'ok' : 'degraded',
      version: '1.0.0',
      uptime: Math.floor((Date.now() - deps.startTime) / 1000),
      connections,
      redis: redisStatus,
    });
  });
}
