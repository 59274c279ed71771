import { z } from 'zod';
import type { CoachingStrategy } from '../../types/coaching.types.js';

const recordSchema = z.record(z.unknown());

export const manifestItemSchema = z.object({
  documentId: z.string().min(1),
  agentId: z.string().min(1),
  extraction: recordSchema,
  groundTruth: recordSchema.optional(),
  basePrompt: z.string().optional(),
});

export const manifestSchema = z.object({
  items: z.array(manifestItemSchema).min(1),
});

export type ManifestItem = z.infer<typeof manifestItemSchema>;
export type Manifest = z.infer<typeof manifestSchema>;

export interface BatchCoachConfig {
  manifest: string;
  format: 'table' | 'json';
}

export interface ItemSummary {
  documentId: string;
  agentId: string;
  status: 'coached' | 'validated' | 'failed';
  valid: boolean;
  issues: string[];
  sessionId?: string;
  strategy?: CoachingStrategy;
  initialAccuracy?: number;
  finalAccuracy?: number;
  improvement?: number;
  golden?: boolean;
  error?: string;
}

export interface BatchCoachResult {
  items: ItemSummary[];
  summary: {
    total: number;
    coached: number;
    validated: number;
    failed: number;
    byStrategy: Partial<Record<CoachingStrategy, number>>;
  };
}
