import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { ExtractionOrchestrator } from '../../services/orchestration/ExtractionOrchestrator.js';
import type { AgentResults, DocumentSection } from '../../types/orchestration.types.js';

interface ValidateBody {
  agentName: string;
  output: unknown;
  expectedFields?: string[];
}

interface CrossValidateBody {
  results: AgentResults;
}

interface PlanBody {
  sections: DocumentSection[];
}

const internalError = (reply: FastifyReply, error: unknown) =>
  reply.code(500).send({
    error: 'INTERNAL_ERROR',
    message: errorMessage(error),
  });

export function createValidateHandler(orchestrator: ExtractionOrchestrator) {
  return async (request: FastifyRequest<{ Body: ValidateBody }>, reply: FastifyReply) => {
    try {
      const { agentName, output, expectedFields } = request.body;
      const result = orchestrator.validateAgentOutput(agentName, output, expectedFields);

      logger.debug({ agentName, isValid: result.isValid, issues: result.issues.length }, 'Agent output validated');

      return reply.code(200).send(result);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Validate handler error');
      return internalError(reply, error);
    }
  };
}

export function createCrossValidateHandler(orchestrator: ExtractionOrchestrator) {
  return async (request: FastifyRequest<{ Body: CrossValidateBody }>, reply: FastifyReply) => {
    try {
      const mismatches = orchestrator.crossValidateAgents(request.body.results);
      return reply.code(200).send({ mismatches });
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Cross-validate handler error');
      return internalError(reply, error);
    }
  };
}

export function createPlanHandler(orchestrator: ExtractionOrchestrator) {
  return async (request: FastifyRequest<{ Body: PlanBody }>, reply: FastifyReply) => {
    try {
      const assignments = orchestrator.mapSectionsToAgents(request.body.sections);
      const batches = orchestrator.generateExecutionPlan(assignments);

      logger.info({ agents: Object.keys(assignments).length, batches: batches.length }, 'Execution plan generated');

      return reply.code(200).send({ assignments, batches });
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Plan handler error');
      return internalError(reply, error);
    }
  };
}
