import type { CoachingDecision, LearningPhase } from '../../types/coaching.types.js';

export const PHASE_BOUNDARIES = {
  exploration: 50,
  optimization: 150,
  convergence: 200,
} as const;

/** Minimum confidence for an action to survive the golden phase. */
export const GOLDEN_OVERRIDE_CONFIDENCE = 0.9;

export const PHASE_GOALS: Record<LearningPhase, string> = {
  exploration: 'Try diverse approaches, maximize learning',
  optimization: 'Refine what works, prune what does not',
  convergence: 'Lock in best practices, minimize changes',
  golden: 'Maintain excellence, avoid regression',
};

export function detectPhase(processedDocuments: number): LearningPhase {
  if (processedDocuments <= PHASE_BOUNDARIES.exploration) return 'exploration';
  if (processedDocuments <= PHASE_BOUNDARIES.optimization) return 'optimization';
  if (processedDocuments <= PHASE_BOUNDARIES.convergence) return 'convergence';
  return 'golden';
}

export function roundLimit(phase: LearningPhase, baseMaxRounds: number): number {
  switch (phase) {
    case 'exploration':
      return baseMaxRounds;
    case 'optimization':
      return Math.min(baseMaxRounds, 3);
    case 'convergence':
      return Math.min(baseMaxRounds, 2);
    case 'golden':
      return 0;
  }
}

const toMaintain = (decision: CoachingDecision, reasoning: string): CoachingDecision => ({
  strategy: 'maintain',
  examplesToAdd: decision.examplesToAdd,
  reasoning,
  confidence: decision.confidence,
  source: 'policy',
});

/**
 * Clamps a decision to what the learning phase allows. Golden phase keeps
 * an action only at confidence >= 0.9 and only for a single round; other
 * phases downgrade to maintain once the round limit is spent.
 */
export function applyPhaseConstraints(
  decision: CoachingDecision,
  phase: LearningPhase,
  roundsCompleted: number,
  baseMaxRounds: number
): CoachingDecision {
  if (decision.strategy === 'maintain') {
    return decision;
  }

  if (phase === 'golden') {
    if (decision.confidence < GOLDEN_OVERRIDE_CONFIDENCE) {
      return toMaintain(decision, `Golden phase: ${decision.strategy} overridden (confidence ${decision.confidence} < ${GOLDEN_OVERRIDE_CONFIDENCE})`);
    }
    if (roundsCompleted >= 1) {
      return toMaintain(decision, 'Golden phase: bounded action already used');
    }
    return decision;
  }

  const limit = roundLimit(phase, baseMaxRounds);
  if (roundsCompleted >= limit) {
    return toMaintain(decision, `Round limit ${limit} reached in ${phase} phase`);
  }

  return decision;
}
