export type ExtractionRecord = Record<string, unknown>;

export type GroundTruth = Record<string, unknown>;

export interface ExtractionPerformance {
  accuracy: number;
  coverage: number;
  precision: number;
  recall: number;
  f1Score: number;
  errors: string[];
  missingFields: string[];
}

export type LearningPhase = 'exploration' | 'optimization' | 'convergence' | 'golden';

export type CoachingStrategy = 'maintain' | 'refine' | 'explore' | 'revert';

export type DecisionSource = 'advisor' | 'fallback' | 'policy';

interface DecisionBase {
  examplesToAdd: ExtractionRecord[];
  reasoning: string;
  confidence: number;
  source: DecisionSource;
}

export interface MaintainDecision extends DecisionBase {
  strategy: 'maintain';
}

export interface RefineDecision extends DecisionBase {
  strategy: 'refine';
  newPrompt?: string;
}

export interface ExploreDecision extends DecisionBase {
  strategy: 'explore';
}

export interface RevertDecision extends DecisionBase {
  strategy: 'revert';
  targetRound: number;
}

export type CoachingDecision = MaintainDecision | RefineDecision | ExploreDecision | RevertDecision;

export type SessionStatus = 'started' | 'completed' | 'failed';

export interface CoachingSession {
  sessionId: string;
  documentId: string;
  agentId: string;
  status: SessionStatus;
  startedAt: string;
  endedAt?: string;
  maxRounds: number;
  roundsCompleted: number;
  initialAccuracy?: number;
  finalAccuracy?: number;
  totalImprovement?: number;
  advisorCalls: number;
  failureReason?: string;
}

export interface PerformanceRecord {
  documentId: string;
  agentId: string;
  coachingRound: number;
  accuracy: number;
  coverage: number;
  precision: number;
  recall: number;
  f1Score: number;
  errors: string[];
  missingFields: string[];
  strategy: CoachingStrategy;
  improvementDelta: number;
  learningPhase: LearningPhase;
  createdAt: string;
}

export interface GoldenExample {
  id: number;
  agentId: string;
  documentId: string;
  extraction: ExtractionRecord;
  accuracy: number;
  coverage: number;
  isActive: boolean;
  createdAt: string;
}

export interface PerformanceTrend {
  avgAccuracy: number | null;
  stdAccuracy: number | null;
  runCount: number;
}

/** A stored extraction round for one (document, agent) pair; accuracy once it was scored. */
export interface RoundSummary {
  round: number;
  accuracy: number | null;
  createdAt: string;
}

export interface HistoricalContext {
  bestEver: PerformanceRecord | null;
  recentRuns: PerformanceRecord[];
  trend: PerformanceTrend;
  goldenExamples: GoldenExample[];
  processedDocuments: number;
  learningPhase: LearningPhase;
  /** Rounds stored for the document being coached; empty for agent-wide history. */
  documentRounds: RoundSummary[];
}

export interface ReextractionRequest {
  documentId: string;
  agentId: string;
  strategy: 'refine' | 'explore';
  basePrompt?: string;
  refinedPrompt?: string;
  examples: ExtractionRecord[];
  hints: string[];
}

export type ReextractFn = (request: ReextractionRequest) => Promise<ExtractionRecord>;

export interface CoachRequest {
  documentId: string;
  agentId: string;
  extraction: ExtractionRecord | null | undefined;
  groundTruth?: GroundTruth | null;
  sessionId?: string;
  basePrompt?: string;
  hints?: string[];
  reextract?: ReextractFn;
}

export interface CoachResult {
  sessionId: string;
  extraction: ExtractionRecord;
  decision: CoachingDecision;
  initialPerformance: ExtractionPerformance;
  finalPerformance: ExtractionPerformance;
  improvement: number;
  promotedToGolden: boolean;
}
