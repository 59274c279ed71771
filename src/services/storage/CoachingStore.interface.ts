import type {
  CoachingSession,
  ExtractionRecord,
  GoldenExample,
  PerformanceRecord,
  PerformanceTrend,
  RoundSummary,
} from '../../types/coaching.types.js';

export interface SessionStart {
  sessionId: string;
  documentId: string;
  agentId: string;
  startedAt: string;
  maxRounds: number;
}

export interface SessionCompletion {
  endedAt: string;
  initialAccuracy: number;
  finalAccuracy: number;
  roundsCompleted: number;
  advisorCalls: number;
}

export interface SessionFailure {
  endedAt: string;
  reason: string;
}

export type NewGoldenExample = Omit<GoldenExample, 'id' | 'isActive'>;

/**
 * Append-only persistence for coaching history. Session updates only ever
 * move a session out of `started`; the boolean results report whether the
 * transition happened.
 */
export interface CoachingStore {
  testConnection(): Promise<boolean>;
  close(): Promise<void>;

  startSession(session: SessionStart): Promise<void>;
  completeSession(sessionId: string, completion: SessionCompletion): Promise<boolean>;
  failSession(sessionId: string, failure: SessionFailure): Promise<boolean>;
  getSession(sessionId: string): Promise<CoachingSession | null>;

  recordPerformance(record: PerformanceRecord): Promise<void>;
  addGoldenExample(example: NewGoldenExample): Promise<number>;

  /** Stores an extraction under the next round number and returns that number. */
  saveRoundExtraction(documentId: string, agentId: string, extraction: ExtractionRecord, createdAt: string): Promise<number>;
  getRoundExtraction(documentId: string, agentId: string, round: number): Promise<ExtractionRecord | null>;
  /** Stored rounds in ascending order, each with the accuracy last recorded for it. */
  listRounds(documentId: string, agentId: string): Promise<RoundSummary[]>;
  countCoachedRounds(documentId: string, agentId: string): Promise<number>;

  countProcessedDocuments(): Promise<number>;
  getBestPerformance(agentId: string): Promise<PerformanceRecord | null>;
  getRecentPerformance(agentId: string, limit: number): Promise<PerformanceRecord[]>;
  getPerformanceTrend(agentId: string, sinceIso: string): Promise<PerformanceTrend>;
  getGoldenExamples(agentId: string, limit: number): Promise<GoldenExample[]>;
}
