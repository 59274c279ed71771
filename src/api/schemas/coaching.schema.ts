import { agentIdSchema, extractionSchema } from './common.schema.js';

export const coachRequestSchema = {
  type: 'object',
  properties: {
    documentId: { type: 'string', minLength: 1 },
    agentId: agentIdSchema,
    extraction: extractionSchema,
    groundTruth: extractionSchema,
    sessionId: { type: 'string', minLength: 1 },
    basePrompt: { type: 'string' },
  },
  required: ['documentId', 'agentId', 'extraction'],
} as const;

export const agentHistoryParamsSchema = {
  type: 'object',
  properties: {
    agentId: agentIdSchema,
  },
  required: ['agentId'],
} as const;

export const sessionParamsSchema = {
  type: 'object',
  properties: {
    sessionId: { type: 'string', minLength: 1 },
  },
  required: ['sessionId'],
} as const;
