import { z } from 'zod';

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    port: z.number().int().positive().default(3000),
    host: z.string().min(1).default('0.0.0.0'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  llm: z.object({
    provider: z.enum(['openai', 'anthropic', 'openrouter']).default('openai'),
    apiKey: z.string().default(''),
    model: z.string().min(1).default('gpt-4o'),
    maxTokens: z.number().int().positive().default(2000),
    temperature: z.number().min(0).max(2).default(0.1),
  }),
  coaching: z.object({
    enabled: z.boolean().default(true),
    dbPath: z.string().min(1).default('./data/coaching.db'),
    maxAdvisorAttempts: z.number().int().positive().default(3),
    advisorBaseDelayMs: z.number().int().min(0).default(1000),
    goldenThreshold: z.number().min(0).max(1).default(0.95),
    defaultMaxRounds: z.number().int().positive().default(5),
    selfEvaluationDiscount: z.number().min(0).max(1).default(0.8),
  }),
  orchestrator: z.object({
    maxParallel: z.number().int().positive().default(4),
    sectionPatternsPath: z.string().min(1).optional(),
  }),
});

export type Config = z.infer<typeof configSchema>;
