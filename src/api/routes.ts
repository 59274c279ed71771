import type { FastifyInstance } from 'fastify';
import { createAgentHistoryHandler, createCoachHandler, createSessionHandler } from './handlers/coaching.handler.js';
import { createCrossValidateHandler, createPlanHandler, createValidateHandler } from './handlers/orchestration.handler.js';
import { errorResponseSchema } from './schemas/common.schema.js';
import { agentHistoryParamsSchema, coachRequestSchema, sessionParamsSchema } from './schemas/coaching.schema.js';
import {
  crossValidateRequestSchema,
  planRequestSchema,
  validateRequestSchema,
  validateResponseSchema,
} from './schemas/orchestration.schema.js';
import type { ReinforcedCoach } from '../services/coaching/ReinforcedCoach.js';
import type { ExtractionOrchestrator } from '../services/orchestration/ExtractionOrchestrator.js';

export async function registerRoutes(
  fastify: FastifyInstance,
  orchestrator: ExtractionOrchestrator,
  coach?: ReinforcedCoach
) {
  fastify.post('/validate', {
    schema: {
      body: validateRequestSchema,
      response: {
        200: validateResponseSchema,
        500: errorResponseSchema,
      },
    },
    handler: createValidateHandler(orchestrator),
  });

  fastify.post('/cross-validate', {
    schema: {
      body: crossValidateRequestSchema,
    },
    handler: createCrossValidateHandler(orchestrator),
  });

  fastify.post('/plan', {
    schema: {
      body: planRequestSchema,
    },
    handler: createPlanHandler(orchestrator),
  });

  if (coach) {
    fastify.post('/coach', {
      schema: {
        body: coachRequestSchema,
      },
      handler: createCoachHandler(coach),
    });

    fastify.get('/agents/:agentId/history', {
      schema: {
        params: agentHistoryParamsSchema,
      },
      handler: createAgentHistoryHandler(coach),
    });

    fastify.get('/sessions/:sessionId', {
      schema: {
        params: sessionParamsSchema,
        response: {
          404: errorResponseSchema,
        },
      },
      handler: createSessionHandler(coach),
    });
  }
}
