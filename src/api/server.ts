import Fastify, { type FastifyInstance } from 'fastify';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { registerRoutes } from './routes.js';
import type { ReinforcedCoach } from '../services/coaching/ReinforcedCoach.js';
import type { ExtractionOrchestrator } from '../services/orchestration/ExtractionOrchestrator.js';

export interface ServerDeps {
  orchestrator: ExtractionOrchestrator;
  coach?: ReinforcedCoach;
}

export async function buildServer({ orchestrator, coach }: ServerDeps): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: false });

  fastify.addHook('onResponse', async (request, reply) => {
    logger.debug({ method: request.method, url: request.url, statusCode: reply.statusCode }, 'Request completed');
  });

  fastify.get('/health', async () => {
    const services = coach ? await coach.testConnections() : { store: false, advisor: false };

    return {
      status: !coach || (services.store && services.advisor) ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: config.server.nodeEnv,
      coaching: Boolean(coach),
      services,
    };
  });

  await registerRoutes(fastify, orchestrator, coach);

  fastify.setErrorHandler((error, request, reply) => {
    logger.error({ error: error.message, url: request.url }, 'Request error');
    const statusCode = error.statusCode ?? 500;
    reply.code(statusCode).send({
      error: statusCode === 400 ? 'VALIDATION_ERROR' : 'INTERNAL_ERROR',
      message: error.message,
    });
  });

  return fastify;
}
