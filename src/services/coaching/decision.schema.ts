import { z } from 'zod';
import { AdvisoryError } from '../../utils/errors.js';
import type { CoachingDecision } from '../../types/coaching.types.js';

const DEFAULT_ADVISOR_CONFIDENCE = 0.7;

export const advisorResponseSchema = z.object({
  strategy: z.enum(['maintain', 'refine', 'explore', 'revert']),
  target_round: z.number().int().positive().nullish(),
  new_prompt: z.string().nullish(),
  examples: z.array(z.record(z.unknown())).nullish(),
  reasoning: z.string().nullish(),
  confidence: z.number().min(0).max(1).nullish(),
});

export type AdvisorResponse = z.infer<typeof advisorResponseSchema>;

const FENCE_PATTERN = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

const stripFences = (raw: string): string => {
  const trimmed = raw.trim();
  const match = FENCE_PATTERN.exec(trimmed);
  return match?.[1] ?? trimmed;
};

/**
 * Parses raw advisor output into a closed decision variant. Anything that is
 * not valid JSON, names an unknown strategy, or asks for a revert without a
 * round is rejected with an AdvisoryError.
 */
export function parseAdvisorResponse(raw: string): CoachingDecision {
  let json: unknown;
  try {
    json = JSON.parse(stripFences(raw));
  } catch (error) {
    throw new AdvisoryError('Advisor response is not valid JSON', error);
  }

  const result = advisorResponseSchema.safeParse(json);
  if (!result.success) {
    throw new AdvisoryError('Advisor response failed schema validation', result.error.issues);
  }

  const advice = result.data;
  const base = {
    examplesToAdd: advice.examples ?? [],
    reasoning: advice.reasoning ?? 'Advisor recommendation',
    confidence: advice.confidence ?? DEFAULT_ADVISOR_CONFIDENCE,
    source: 'advisor' as const,
  };

  switch (advice.strategy) {
    case 'maintain':
      return { ...base, strategy: 'maintain' };
    case 'explore':
      return { ...base, strategy: 'explore' };
    case 'refine':
      return advice.new_prompt
        ? { ...base, strategy: 'refine', newPrompt: advice.new_prompt }
        : { ...base, strategy: 'refine' };
    case 'revert':
      if (advice.target_round === null || advice.target_round === undefined) {
        throw new AdvisoryError('Advisor requested revert without target_round');
      }
      return { ...base, strategy: 'revert', targetRound: advice.target_round };
  }
}
