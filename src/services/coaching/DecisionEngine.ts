import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { retryOrFallback } from '../../utils/retry.js';
import type { AdvisoryService } from '../llm/AdvisoryService.interface.js';
import {
  COACHING_DECISION_SYSTEM_PROMPT,
  COACHING_DECISION_USER_PROMPT,
} from '../llm/prompts/coaching-decision.js';
import { getMaxRounds } from '../orchestration/AgentCatalog.js';
import { applyPhaseConstraints } from './PhasePolicy.js';
import { parseAdvisorResponse } from './decision.schema.js';
import type {
  CoachingDecision,
  CoachingStrategy,
  ExtractionPerformance,
  HistoricalContext,
} from '../../types/coaching.types.js';

export const MAINTAIN_THRESHOLD = 0.95;
export const EXPLORE_THRESHOLD = 0.6;
export const FALLBACK_CONFIDENCE = 0.5;

export interface DecisionEngineOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxRoundsFor?: (agentId: string) => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface DecisionOutcome {
  decision: CoachingDecision;
  advisorCalls: number;
}

/** Deterministic decision used whenever the advisor cannot be reached. */
export function fallbackDecision(performance: ExtractionPerformance): CoachingDecision {
  let strategy: Extract<CoachingStrategy, 'maintain' | 'explore' | 'refine'>;
  if (performance.accuracy >= MAINTAIN_THRESHOLD) {
    strategy = 'maintain';
  } else if (performance.accuracy < EXPLORE_THRESHOLD) {
    strategy = 'explore';
  } else {
    strategy = 'refine';
  }

  return {
    strategy,
    examplesToAdd: [],
    reasoning: 'Fallback decision based on accuracy threshold',
    confidence: FALLBACK_CONFIDENCE,
    source: 'fallback',
  };
}

export class DecisionEngine {
  private maxAttempts: number;
  private baseDelayMs: number;
  private maxRoundsFor: (agentId: string) => number;
  private sleep?: (ms: number) => Promise<void>;

  constructor(private advisor: AdvisoryService, options: DecisionEngineOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? config.coaching.maxAdvisorAttempts;
    this.baseDelayMs = options.baseDelayMs ?? config.coaching.advisorBaseDelayMs;
    this.maxRoundsFor = options.maxRoundsFor ?? (agentId => getMaxRounds(agentId, config.coaching.defaultMaxRounds));
    this.sleep = options.sleep;
  }

  async decide(
    agentId: string,
    performance: ExtractionPerformance,
    context: HistoricalContext,
    roundsCompleted = 0
  ): Promise<CoachingDecision> {
    const { decision } = await this.evaluate(agentId, performance, context, roundsCompleted);
    return decision;
  }

  async evaluate(
    agentId: string,
    performance: ExtractionPerformance,
    context: HistoricalContext,
    roundsCompleted = 0
  ): Promise<DecisionOutcome> {
    if (context.learningPhase === 'golden' && performance.accuracy >= MAINTAIN_THRESHOLD) {
      return {
        decision: {
          strategy: 'maintain',
          examplesToAdd: [],
          reasoning: 'Golden state achieved with high accuracy',
          confidence: 1.0,
          source: 'policy',
        },
        advisorCalls: 0,
      };
    }

    const request = {
      systemPrompt: COACHING_DECISION_SYSTEM_PROMPT,
      userPrompt: COACHING_DECISION_USER_PROMPT({ agentId, performance, context }),
    };

    const outcome = await retryOrFallback(
      async () => parseAdvisorResponse(await this.advisor.advise(request)),
      {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.baseDelayMs,
        sleep: this.sleep,
        onRetry: (attempt, error) =>
          logger.warn({ agentId, attempt, error: error.message }, 'Advisory call failed, retrying'),
        fallback: (error, attempts) => {
          logger.warn({ agentId, attempts, error: error.message }, 'Advisory unavailable, using fallback decision');
          return fallbackDecision(performance);
        },
      }
    );

    const decision = applyPhaseConstraints(
      outcome.value,
      context.learningPhase,
      roundsCompleted,
      this.maxRoundsFor(agentId)
    );

    logger.debug(
      { agentId, strategy: decision.strategy, source: decision.source, confidence: decision.confidence },
      'Coaching decision made'
    );

    return { decision, advisorCalls: outcome.attempts };
  }
}
