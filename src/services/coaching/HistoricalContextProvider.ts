import type { CoachingStore } from '../storage/CoachingStore.interface.js';
import type { HistoricalContext } from '../../types/coaching.types.js';
import { detectPhase } from './PhasePolicy.js';

const RECENT_RUNS = 5;
const GOLDEN_EXAMPLES = 3;
const TREND_WINDOW_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

export class HistoricalContextProvider {
  constructor(
    private store: CoachingStore,
    private now: () => Date = () => new Date()
  ) {}

  /** Agent-wide history; with a document id it also lists that document's stored rounds. */
  async getContext(agentId: string, documentId?: string): Promise<HistoricalContext> {
    const since = new Date(this.now().getTime() - TREND_WINDOW_DAYS * DAY_MS).toISOString();

    const [bestEver, recentRuns, trend, goldenExamples, processedDocuments, documentRounds] = await Promise.all([
      this.store.getBestPerformance(agentId),
      this.store.getRecentPerformance(agentId, RECENT_RUNS),
      this.store.getPerformanceTrend(agentId, since),
      this.store.getGoldenExamples(agentId, GOLDEN_EXAMPLES),
      this.store.countProcessedDocuments(),
      documentId === undefined ? Promise.resolve([]) : this.store.listRounds(documentId, agentId),
    ]);

    return {
      bestEver,
      recentRuns,
      trend,
      goldenExamples,
      processedDocuments,
      learningPhase: detectPhase(processedDocuments),
      documentRounds,
    };
  }
}
