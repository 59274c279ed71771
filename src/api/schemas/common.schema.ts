export const errorResponseSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
  },
} as const;

export const extractionSchema = {
  type: 'object',
  additionalProperties: true,
} as const;

export const agentIdSchema = {
  type: 'string',
  minLength: 1,
  pattern: '^[a-z0-9_]+$',
} as const;
