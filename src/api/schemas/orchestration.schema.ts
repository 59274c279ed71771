import { agentIdSchema } from './common.schema.js';

const MAX_PAGE = 10_000;
const pageNumberSchema = { type: 'integer', minimum: 1, maximum: MAX_PAGE } as const;

export const validateRequestSchema = {
  type: 'object',
  properties: {
    agentName: agentIdSchema,
    output: {},
    expectedFields: { type: 'array', items: { type: 'string' } },
  },
  required: ['agentName', 'output'],
} as const;

export const validateResponseSchema = {
  type: 'object',
  properties: {
    isValid: { type: 'boolean' },
    issues: { type: 'array', items: { type: 'string' } },
  },
  required: ['isValid', 'issues'],
} as const;

export const crossValidateRequestSchema = {
  type: 'object',
  properties: {
    results: { type: 'object', additionalProperties: true },
  },
  required: ['results'],
} as const;

const sectionSchema = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    type: { type: 'string' },
    page: pageNumberSchema,
    startPage: pageNumberSchema,
    endPage: pageNumberSchema,
  },
  required: ['name'],
} as const;

export const planRequestSchema = {
  type: 'object',
  properties: {
    sections: { type: 'array', items: sectionSchema },
  },
  required: ['sections'],
} as const;
