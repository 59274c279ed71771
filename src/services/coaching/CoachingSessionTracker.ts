import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { InvalidSessionTransitionError } from '../../utils/errors.js';
import { generateId } from '../../utils/uuid.js';
import type { CoachingStore } from '../storage/CoachingStore.interface.js';
import type {
  CoachingSession,
  ExtractionPerformance,
  ExtractionRecord,
  PerformanceRecord,
} from '../../types/coaching.types.js';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `${agentId}_${documentId}_YYYYMMDD_HHMMSS_mmm_${suffix}` (UTC). The random
 * suffix keeps ids distinct when one pair is coached twice in a millisecond.
 */
export function buildSessionId(
  agentId: string,
  documentId: string,
  at: Date,
  suffix: string = generateId().slice(0, 8)
): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  const millis = String(at.getUTCMilliseconds()).padStart(3, '0');
  return `${agentId}_${documentId}_${date}_${time}_${millis}_${suffix}`;
}

export interface SessionResult {
  initialAccuracy: number;
  finalAccuracy: number;
  roundsCompleted: number;
  advisorCalls: number;
}

/**
 * Sole writer of session lifecycle, learning outcomes and golden examples.
 * A session moves started -> completed | failed exactly once.
 */
export class CoachingSessionTracker {
  private goldenThreshold: number;

  constructor(
    private store: CoachingStore,
    private now: () => Date = () => new Date(),
    goldenThreshold?: number
  ) {
    this.goldenThreshold = goldenThreshold ?? config.coaching.goldenThreshold;
  }

  timestamp(): string {
    return this.now().toISOString();
  }

  async start(sessionId: string, documentId: string, agentId: string, maxRounds: number): Promise<void> {
    await this.store.startSession({ sessionId, documentId, agentId, startedAt: this.timestamp(), maxRounds });
    logger.info({ sessionId, documentId, agentId, maxRounds }, 'Coaching session started');
  }

  async complete(sessionId: string, result: SessionResult): Promise<void> {
    const updated = await this.store.completeSession(sessionId, { ...result, endedAt: this.timestamp() });
    if (!updated) {
      throw new InvalidSessionTransitionError(`Session ${sessionId} is not in progress`, { sessionId, to: 'completed' });
    }
    logger.info(
      { sessionId, ...result, improvement: result.finalAccuracy - result.initialAccuracy },
      'Coaching session completed'
    );
  }

  async fail(sessionId: string, reason: string): Promise<void> {
    const updated = await this.store.failSession(sessionId, { endedAt: this.timestamp(), reason });
    if (!updated) {
      throw new InvalidSessionTransitionError(`Session ${sessionId} is not in progress`, { sessionId, to: 'failed' });
    }
    logger.warn({ sessionId, reason }, 'Coaching session failed');
  }

  async get(sessionId: string): Promise<CoachingSession | null> {
    return this.store.getSession(sessionId);
  }

  async recordOutcome(record: Omit<PerformanceRecord, 'createdAt'>): Promise<void> {
    await this.store.recordPerformance({ ...record, createdAt: this.timestamp() });
  }

  /** Stores the extraction as a golden example when it clears the threshold. */
  async promoteIfGolden(
    agentId: string,
    documentId: string,
    extraction: ExtractionRecord,
    performance: ExtractionPerformance
  ): Promise<boolean> {
    if (performance.accuracy < this.goldenThreshold) {
      return false;
    }

    const id = await this.store.addGoldenExample({
      agentId,
      documentId,
      extraction,
      accuracy: performance.accuracy,
      coverage: performance.coverage,
      createdAt: this.timestamp(),
    });
    logger.info({ agentId, documentId, goldenExampleId: id, accuracy: performance.accuracy }, 'Golden example stored');
    return true;
  }
}
