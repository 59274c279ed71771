import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { ReinforcedCoach } from './services/coaching/ReinforcedCoach.js';
import { ExtractionOrchestrator } from './services/orchestration/ExtractionOrchestrator.js';
import { buildServer } from './api/server.js';

logger.info('Initializing services...');

const coach = config.coaching.enabled ? await ReinforcedCoach.create() : undefined;
const orchestrator = new ExtractionOrchestrator({ coach });

logger.info({ coaching: Boolean(coach), phase: coach ? await coach.currentPhase() : null }, 'Services initialized');

const fastify = await buildServer({ orchestrator, coach });

const shutdown = async () => {
  logger.info('Shutting down gracefully...');
  await fastify.close();
  await coach?.close();
  logger.info('Shutdown complete');
  process.exit(0);
};

const onSignal = () => {
  shutdown().catch(error => {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Shutdown failed');
    process.exit(1);
  });
};

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

try {
  await fastify.listen({
    port: config.server.port,
    host: config.server.host,
  });
  logger.info(`Server listening on port ${config.server.port}`);
} catch (err) {
  logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Server failed to start');
  process.exit(1);
}
