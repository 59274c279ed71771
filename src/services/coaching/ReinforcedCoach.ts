import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { ValidationError, errorMessage } from '../../utils/errors.js';
import { isRecord } from '../../utils/values.js';
import type { CoachingStore } from '../storage/CoachingStore.interface.js';
import { SQLiteCoachingStore } from '../storage/SQLiteCoachingStore.js';
import type { AdvisoryService } from '../llm/AdvisoryService.interface.js';
import { AdvisoryServiceFactory } from '../llm/AdvisoryServiceFactory.js';
import { getMaxRounds } from '../orchestration/AgentCatalog.js';
import { PerformanceAnalyzer } from './PerformanceAnalyzer.js';
import { DecisionEngine, type DecisionEngineOptions } from './DecisionEngine.js';
import { HistoricalContextProvider } from './HistoricalContextProvider.js';
import { detectPhase } from './PhasePolicy.js';
import { CoachingSessionTracker, buildSessionId } from './CoachingSessionTracker.js';
import type {
  CoachingDecision,
  CoachingSession,
  CoachRequest,
  CoachResult,
  ExtractionPerformance,
  ExtractionRecord,
  HistoricalContext,
  LearningPhase,
} from '../../types/coaching.types.js';

export interface ReinforcedCoachDeps {
  store: CoachingStore;
  advisor: AdvisoryService;
  analyzer?: PerformanceAnalyzer;
  decisionOptions?: DecisionEngineOptions;
  now?: () => Date;
}

interface CycleState {
  request: CoachRequest;
  sessionId: string;
  original: ExtractionRecord;
  initialRound: number;
  performance: ExtractionPerformance;
  context: HistoricalContext;
}

/**
 * One coaching cycle per (document, agent): analyze, decide, apply,
 * revalidate, persist. Sessions that throw are marked failed and the error
 * is rethrown.
 */
export class ReinforcedCoach {
  private store: CoachingStore;
  private advisor: AdvisoryService;
  private analyzer: PerformanceAnalyzer;
  private decisionEngine: DecisionEngine;
  private contextProvider: HistoricalContextProvider;
  private tracker: CoachingSessionTracker;
  private now: () => Date;

  constructor(deps: ReinforcedCoachDeps) {
    this.store = deps.store;
    this.advisor = deps.advisor;
    this.now = deps.now ?? (() => new Date());
    this.analyzer = deps.analyzer ?? new PerformanceAnalyzer();
    this.decisionEngine = new DecisionEngine(deps.advisor, deps.decisionOptions);
    this.contextProvider = new HistoricalContextProvider(deps.store, this.now);
    this.tracker = new CoachingSessionTracker(deps.store, this.now);
  }

  /** Builds a coach from configuration. Throws ConfigurationError when a dependency is unusable. */
  static async create(): Promise<ReinforcedCoach> {
    const dbPath = config.coaching.dbPath;
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    const store = new SQLiteCoachingStore(dbPath);
    const advisor = AdvisoryServiceFactory.createAdvisoryService();
    return new ReinforcedCoach({ store, advisor });
  }

  async currentPhase(): Promise<LearningPhase> {
    return detectPhase(await this.store.countProcessedDocuments());
  }

  async getHistory(agentId: string): Promise<HistoricalContext> {
    return this.contextProvider.getContext(agentId);
  }

  async getSession(sessionId: string): Promise<CoachingSession | null> {
    return this.tracker.get(sessionId);
  }

  async testConnections(): Promise<{ store: boolean; advisor: boolean }> {
    const [store, advisor] = await Promise.all([this.store.testConnection(), this.advisor.testConnection()]);
    return { store, advisor };
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  async coach(request: CoachRequest): Promise<CoachResult> {
    const { documentId, agentId } = request;
    const sessionId = request.sessionId ?? buildSessionId(agentId, documentId, this.now());
    const maxRounds = getMaxRounds(agentId, config.coaching.defaultMaxRounds);

    await this.tracker.start(sessionId, documentId, agentId, maxRounds);

    try {
      const original: ExtractionRecord = isRecord(request.extraction) ? structuredClone(request.extraction) : {};
      const initialRound = await this.store.saveRoundExtraction(documentId, agentId, original, this.tracker.timestamp());

      const performance = this.analyzer.analyze(original, request.groundTruth);
      const context = await this.contextProvider.getContext(agentId, documentId);
      const roundsCompleted = await this.store.countCoachedRounds(documentId, agentId);
      const { decision, advisorCalls } = await this.decisionEngine.evaluate(agentId, performance, context, roundsCompleted);

      const state: CycleState = { request, sessionId, original, initialRound, performance, context };
      await this.promoteSuggestedExamples(state, decision);

      if (decision.strategy === 'maintain') {
        return await this.completeUnchanged(state, decision, advisorCalls);
      }

      const coached = await this.applyDecision(state, decision);
      const coachedRound = await this.store.saveRoundExtraction(documentId, agentId, coached, this.tracker.timestamp());
      const finalPerformance = this.analyzer.analyze(coached, request.groundTruth);
      const improvement = finalPerformance.accuracy - performance.accuracy;

      await this.tracker.recordOutcome({
        ...this.metrics(finalPerformance),
        documentId,
        agentId,
        coachingRound: coachedRound,
        strategy: decision.strategy,
        improvementDelta: improvement,
        learningPhase: context.learningPhase,
      });

      const promotedToGolden = await this.tracker.promoteIfGolden(agentId, documentId, coached, finalPerformance);

      await this.tracker.complete(sessionId, {
        initialAccuracy: performance.accuracy,
        finalAccuracy: finalPerformance.accuracy,
        roundsCompleted: 1,
        advisorCalls,
      });

      return {
        sessionId,
        extraction: coached,
        decision,
        initialPerformance: performance,
        finalPerformance,
        improvement,
        promotedToGolden,
      };
    } catch (error) {
      await this.failSession(sessionId, error);
      throw error;
    }
  }

  private async completeUnchanged(
    state: CycleState,
    decision: CoachingDecision,
    advisorCalls: number
  ): Promise<CoachResult> {
    const { request, sessionId, performance } = state;

    await this.tracker.recordOutcome({
      ...this.metrics(performance),
      documentId: request.documentId,
      agentId: request.agentId,
      coachingRound: state.initialRound,
      strategy: 'maintain',
      improvementDelta: 0,
      learningPhase: state.context.learningPhase,
    });

    await this.tracker.complete(sessionId, {
      initialAccuracy: performance.accuracy,
      finalAccuracy: performance.accuracy,
      roundsCompleted: 0,
      advisorCalls,
    });

    return {
      sessionId,
      extraction: state.original,
      decision,
      initialPerformance: performance,
      finalPerformance: performance,
      improvement: 0,
      promotedToGolden: false,
    };
  }

  private async applyDecision(state: CycleState, decision: CoachingDecision): Promise<ExtractionRecord> {
    const { request, original, context } = state;
    const { documentId, agentId } = request;

    switch (decision.strategy) {
      case 'maintain':
        return original;

      case 'revert': {
        const restored = await this.store.getRoundExtraction(documentId, agentId, decision.targetRound);
        if (!restored) {
          logger.warn({ documentId, agentId, targetRound: decision.targetRound }, 'Revert target round not found, keeping extraction');
          return original;
        }
        return restored;
      }

      case 'refine':
      case 'explore': {
        if (!request.reextract) {
          logger.info({ documentId, agentId, strategy: decision.strategy }, 'No re-extraction callback, keeping extraction');
          return original;
        }
        if (decision.strategy === 'refine' && !decision.newPrompt) {
          logger.info({ documentId, agentId }, 'Refine decision without prompt, keeping extraction');
          return original;
        }

        const result: unknown = await request.reextract({
          documentId,
          agentId,
          strategy: decision.strategy,
          basePrompt: request.basePrompt,
          refinedPrompt: decision.strategy === 'refine' ? decision.newPrompt : undefined,
          examples: [...context.goldenExamples.map(example => example.extraction), ...decision.examplesToAdd],
          hints: request.hints ?? [],
        });

        if (!isRecord(result)) {
          throw new ValidationError(`Re-extraction for ${agentId} returned a non-object result`);
        }
        return result;
      }
    }
  }

  /** Advisor-suggested examples join the golden pool only if they score as golden. */
  private async promoteSuggestedExamples(state: CycleState, decision: CoachingDecision): Promise<void> {
    const { documentId, agentId } = state.request;
    for (const example of decision.examplesToAdd) {
      const performance = this.analyzer.analyze(example, state.request.groundTruth);
      await this.tracker.promoteIfGolden(agentId, documentId, example, performance);
    }
  }

  private metrics(performance: ExtractionPerformance) {
    return {
      accuracy: performance.accuracy,
      coverage: performance.coverage,
      precision: performance.precision,
      recall: performance.recall,
      f1Score: performance.f1Score,
      errors: performance.errors,
      missingFields: performance.missingFields,
    };
  }

  private async failSession(sessionId: string, error: unknown): Promise<void> {
    try {
      await this.tracker.fail(sessionId, errorMessage(error));
    } catch (failError) {
      logger.error({ sessionId, error: errorMessage(failError) }, 'Could not mark coaching session as failed');
    }
  }
}
