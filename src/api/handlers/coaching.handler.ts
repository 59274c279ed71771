import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import { InvalidSessionTransitionError, ValidationError, errorMessage } from '../../utils/errors.js';
import type { ReinforcedCoach } from '../../services/coaching/ReinforcedCoach.js';
import type { ExtractionRecord, GroundTruth } from '../../types/coaching.types.js';

interface CoachBody {
  documentId: string;
  agentId: string;
  extraction: ExtractionRecord;
  groundTruth?: GroundTruth;
  sessionId?: string;
  basePrompt?: string;
}

interface AgentParams {
  agentId: string;
}

interface SessionParams {
  sessionId: string;
}

export function createCoachHandler(coach: ReinforcedCoach) {
  return async (request: FastifyRequest<{ Body: CoachBody }>, reply: FastifyReply) => {
    try {
      const { documentId, agentId } = request.body;
      logger.info({ documentId, agentId }, 'Coaching request received');

      const result = await coach.coach(request.body);

      return reply.code(200).send(result);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Coach handler error');

      if (error instanceof ValidationError) {
        return reply.code(400).send({ error: error.code, message: error.message });
      }
      if (error instanceof InvalidSessionTransitionError) {
        return reply.code(409).send({ error: error.code, message: error.message });
      }

      return reply.code(500).send({
        error: 'INTERNAL_ERROR',
        message: errorMessage(error),
      });
    }
  };
}

export function createAgentHistoryHandler(coach: ReinforcedCoach) {
  return async (request: FastifyRequest<{ Params: AgentParams }>, reply: FastifyReply) => {
    try {
      const history = await coach.getHistory(request.params.agentId);
      return reply.code(200).send({ agentId: request.params.agentId, ...history });
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Agent history handler error');
      return reply.code(500).send({
        error: 'INTERNAL_ERROR',
        message: errorMessage(error),
      });
    }
  };
}

export function createSessionHandler(coach: ReinforcedCoach) {
  return async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
    try {
      const session = await coach.getSession(request.params.sessionId);

      if (!session) {
        return reply.code(404).send({
          error: 'NOT_FOUND',
          message: `Session ${request.params.sessionId} not found`,
        });
      }

      return reply.code(200).send(session);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Session handler error');
      return reply.code(500).send({
        error: 'INTERNAL_ERROR',
        message: errorMessage(error),
      });
    }
  };
}
