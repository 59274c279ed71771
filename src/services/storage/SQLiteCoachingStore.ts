import Database from 'better-sqlite3';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { CoachingPersistenceError, ConfigurationError } from '../../utils/errors.js';
import { isRecord } from '../../utils/values.js';
import type {
  CoachingSession,
  ExtractionRecord,
  GoldenExample,
  PerformanceRecord,
  PerformanceTrend,
  RoundSummary,
} from '../../types/coaching.types.js';
import type {
  CoachingStore,
  NewGoldenExample,
  SessionCompletion,
  SessionFailure,
  SessionStart,
} from './CoachingStore.interface.js';

const strategySchema = z.enum(['maintain', 'refine', 'explore', 'revert']);
const phaseSchema = z.enum(['exploration', 'optimization', 'convergence', 'golden']);

const performanceRowSchema = z.object({
  doc_id: z.string(),
  agent_id: z.string(),
  coaching_round: z.number(),
  accuracy: z.number(),
  coverage: z.number(),
  precision_score: z.number(),
  recall_score: z.number(),
  f1_score: z.number(),
  errors: z.string(),
  missing_fields: z.string(),
  strategy_used: strategySchema,
  improvement_delta: z.number(),
  learning_phase: phaseSchema,
  created_at: z.string(),
});

const sessionRowSchema = z.object({
  session_id: z.string(),
  doc_id: z.string(),
  agent_id: z.string(),
  status: z.enum(['started', 'completed', 'failed']),
  start_time: z.string(),
  end_time: z.string().nullable(),
  max_rounds: z.number(),
  rounds_completed: z.number(),
  initial_accuracy: z.number().nullable(),
  final_accuracy: z.number().nullable(),
  total_improvement: z.number().nullable(),
  advisor_calls: z.number(),
  failure_reason: z.string().nullable(),
});

const goldenRowSchema = z.object({
  id: z.number(),
  doc_id: z.string(),
  agent_id: z.string(),
  extraction_json: z.string(),
  accuracy_score: z.number(),
  coverage_score: z.number(),
  is_active: z.number(),
  created_at: z.string(),
});

const countRowSchema = z.object({ count: z.number() });

const trendRowSchema = z.object({
  run_count: z.number(),
  avg_accuracy: z.number().nullable(),
  sum_squares: z.number().nullable(),
});

const extractionRowSchema = z.object({ extraction_json: z.string() });

const roundRowSchema = z.object({
  round: z.number(),
  accuracy: z.number().nullable(),
  created_at: z.string(),
});

const parseRecord = (json: string): ExtractionRecord => {
  const parsed: unknown = JSON.parse(json);
  return isRecord(parsed) ? parsed : {};
};

const parseStringList = (json: string): string[] => {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : [];
};

const toPerformanceRecord = (row: unknown): PerformanceRecord => {
  const r = performanceRowSchema.parse(row);
  return {
    documentId: r.doc_id,
    agentId: r.agent_id,
    coachingRound: r.coaching_round,
    accuracy: r.accuracy,
    coverage: r.coverage,
    precision: r.precision_score,
    recall: r.recall_score,
    f1Score: r.f1_score,
    errors: parseStringList(r.errors),
    missingFields: parseStringList(r.missing_fields),
    strategy: r.strategy_used,
    improvementDelta: r.improvement_delta,
    learningPhase: r.learning_phase,
    createdAt: r.created_at,
  };
};

const toGoldenExample = (row: unknown): GoldenExample => {
  const r = goldenRowSchema.parse(row);
  return {
    id: r.id,
    documentId: r.doc_id,
    agentId: r.agent_id,
    extraction: parseRecord(r.extraction_json),
    accuracy: r.accuracy_score,
    coverage: r.coverage_score,
    isActive: r.is_active === 1,
    createdAt: r.created_at,
  };
};

const toSession = (row: unknown): CoachingSession => {
  const r = sessionRowSchema.parse(row);
  return {
    sessionId: r.session_id,
    documentId: r.doc_id,
    agentId: r.agent_id,
    status: r.status,
    startedAt: r.start_time,
    endedAt: r.end_time ?? undefined,
    maxRounds: r.max_rounds,
    roundsCompleted: r.rounds_completed,
    initialAccuracy: r.initial_accuracy ?? undefined,
    finalAccuracy: r.final_accuracy ?? undefined,
    totalImprovement: r.total_improvement ?? undefined,
    advisorCalls: r.advisor_calls,
    failureReason: r.failure_reason ?? undefined,
  };
};

export class SQLiteCoachingStore implements CoachingStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    try {
      this.db = new Database(dbPath);
    } catch (error) {
      throw new ConfigurationError(`Cannot open coaching database at ${dbPath}`, error);
    }
    this.initSchema();
    logger.info({ dbPath }, 'SQLite coaching store initialized');
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS coaching_performance (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        doc_id TEXT NOT NULL,
        agent_id TEXT NOT NULL,
        coaching_round INTEGER NOT NULL,
        accuracy REAL NOT NULL,
        coverage REAL NOT NULL,
        precision_score REAL NOT NULL,
        recall_score REAL NOT NULL,
        f1_score REAL NOT NULL,
        errors TEXT NOT NULL,
        missing_fields TEXT NOT NULL,
        strategy_used TEXT NOT NULL,
        improvement_delta REAL NOT NULL,
        learning_phase TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_performance_agent_accuracy ON coaching_performance(agent_id, accuracy DESC);
      CREATE INDEX IF NOT EXISTS idx_performance_doc_agent ON coaching_performance(doc_id, agent_id);

      CREATE TABLE IF NOT EXISTS coaching_sessions (
        session_id TEXT PRIMARY KEY,
        doc_id TEXT NOT NULL,
        agent_id TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'started',
        start_time TEXT NOT NULL,
        end_time TEXT,
        max_rounds INTEGER NOT NULL,
        rounds_completed INTEGER NOT NULL DEFAULT 0,
        initial_accuracy REAL,
        final_accuracy REAL,
        total_improvement REAL,
        advisor_calls INTEGER NOT NULL DEFAULT 0,
        failure_reason TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_sessions_status ON coaching_sessions(status, start_time DESC);

      CREATE TABLE IF NOT EXISTS golden_examples (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        doc_id TEXT NOT NULL,
        agent_id TEXT NOT NULL,
        extraction_json TEXT NOT NULL,
        accuracy_score REAL NOT NULL,
        coverage_score REAL NOT NULL,
        is_active INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_golden_agent ON golden_examples(agent_id, accuracy_score DESC);

      CREATE TABLE IF NOT EXISTS coaching_rounds (
        doc_id TEXT NOT NULL,
        agent_id TEXT NOT NULL,
        round INTEGER NOT NULL,
        extraction_json TEXT NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (doc_id, agent_id, round)
      );
    `);
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      logger.error({ error, operation }, 'Coaching store operation failed');
      throw new CoachingPersistenceError(`Coaching store ${operation} failed`, error);
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }

  async startSession(session: SessionStart): Promise<void> {
    this.run('startSession', () =>
      this.db
        .prepare(`
          INSERT INTO coaching_sessions (session_id, doc_id, agent_id, status, start_time, max_rounds)
          VALUES (?, ?, ?, 'started', ?, ?)
        `)
        .run(session.sessionId, session.documentId, session.agentId, session.startedAt, session.maxRounds)
    );
  }

  async completeSession(sessionId: string, completion: SessionCompletion): Promise<boolean> {
    const result = this.run('completeSession', () =>
      this.db
        .prepare(`
          UPDATE coaching_sessions
          SET status = 'completed', end_time = ?, initial_accuracy = ?, final_accuracy = ?,
              total_improvement = ?, rounds_completed = ?, advisor_calls = ?
          WHERE session_id = ? AND status = 'started'
        `)
        .run(
          completion.endedAt,
          completion.initialAccuracy,
          completion.finalAccuracy,
          completion.finalAccuracy - completion.initialAccuracy,
          completion.roundsCompleted,
          completion.advisorCalls,
          sessionId
        )
    );
    return result.changes === 1;
  }

  async failSession(sessionId: string, failure: SessionFailure): Promise<boolean> {
    const result = this.run('failSession', () =>
      this.db
        .prepare(`
          UPDATE coaching_sessions
          SET status = 'failed', end_time = ?, failure_reason = ?
          WHERE session_id = ? AND status = 'started'
        `)
        .run(failure.endedAt, failure.reason, sessionId)
    );
    return result.changes === 1;
  }

  async getSession(sessionId: string): Promise<CoachingSession | null> {
    const row = this.run('getSession', () =>
      this.db.prepare('SELECT * FROM coaching_sessions WHERE session_id = ?').get(sessionId)
    );
    return row ? toSession(row) : null;
  }

  async recordPerformance(record: PerformanceRecord): Promise<void> {
    this.run('recordPerformance', () =>
      this.db
        .prepare(`
          INSERT INTO coaching_performance (
            doc_id, agent_id, coaching_round, accuracy, coverage, precision_score, recall_score, f1_score,
            errors, missing_fields, strategy_used, improvement_delta, learning_phase, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          record.documentId,
          record.agentId,
          record.coachingRound,
          record.accuracy,
          record.coverage,
          record.precision,
          record.recall,
          record.f1Score,
          JSON.stringify(record.errors),
          JSON.stringify(record.missingFields),
          record.strategy,
          record.improvementDelta,
          record.learningPhase,
          record.createdAt
        )
    );
  }

  async addGoldenExample(example: NewGoldenExample): Promise<number> {
    const result = this.run('addGoldenExample', () =>
      this.db
        .prepare(`
          INSERT INTO golden_examples (doc_id, agent_id, extraction_json, accuracy_score, coverage_score, created_at)
          VALUES (?, ?, ?, ?, ?, ?)
        `)
        .run(
          example.documentId,
          example.agentId,
          JSON.stringify(example.extraction),
          example.accuracy,
          example.coverage,
          example.createdAt
        )
    );
    return Number(result.lastInsertRowid);
  }

  async saveRoundExtraction(
    documentId: string,
    agentId: string,
    extraction: ExtractionRecord,
    createdAt: string
  ): Promise<number> {
    const insert = this.db.transaction((): number => {
      const row = countRowSchema.parse(
        this.db
          .prepare('SELECT COALESCE(MAX(round), 0) AS count FROM coaching_rounds WHERE doc_id = ? AND agent_id = ?')
          .get(documentId, agentId)
      );
      const round = row.count + 1;
      this.db
        .prepare('INSERT INTO coaching_rounds (doc_id, agent_id, round, extraction_json, created_at) VALUES (?, ?, ?, ?, ?)')
        .run(documentId, agentId, round, JSON.stringify(extraction), createdAt);
      return round;
    });
    return this.run('saveRoundExtraction', () => insert());
  }

  async getRoundExtraction(documentId: string, agentId: string, round: number): Promise<ExtractionRecord | null> {
    const row = this.run('getRoundExtraction', () =>
      this.db
        .prepare('SELECT extraction_json FROM coaching_rounds WHERE doc_id = ? AND agent_id = ? AND round = ?')
        .get(documentId, agentId, round)
    );
    return row ? parseRecord(extractionRowSchema.parse(row).extraction_json) : null;
  }

  async listRounds(documentId: string, agentId: string): Promise<RoundSummary[]> {
    const rows = this.run('listRounds', () =>
      this.db
        .prepare(`
          SELECT r.round, r.created_at, (
            SELECT p.accuracy FROM coaching_performance p
            WHERE p.doc_id = r.doc_id AND p.agent_id = r.agent_id AND p.coaching_round = r.round
            ORDER BY p.id DESC LIMIT 1
          ) AS accuracy
          FROM coaching_rounds r
          WHERE r.doc_id = ? AND r.agent_id = ?
          ORDER BY r.round ASC
        `)
        .all(documentId, agentId)
    );
    return rows.map(row => {
      const r = roundRowSchema.parse(row);
      return { round: r.round, accuracy: r.accuracy, createdAt: r.created_at };
    });
  }

  async countCoachedRounds(documentId: string, agentId: string): Promise<number> {
    const row = this.run('countCoachedRounds', () =>
      this.db
        .prepare(`
          SELECT COUNT(*) AS count FROM coaching_performance
          WHERE doc_id = ? AND agent_id = ? AND strategy_used != 'maintain'
        `)
        .get(documentId, agentId)
    );
    return countRowSchema.parse(row).count;
  }

  async countProcessedDocuments(): Promise<number> {
    const row = this.run('countProcessedDocuments', () =>
      this.db.prepare('SELECT COUNT(DISTINCT doc_id) AS count FROM coaching_performance').get()
    );
    return countRowSchema.parse(row).count;
  }

  async getBestPerformance(agentId: string): Promise<PerformanceRecord | null> {
    const row = this.run('getBestPerformance', () =>
      this.db
        .prepare('SELECT * FROM coaching_performance WHERE agent_id = ? ORDER BY accuracy DESC, id DESC LIMIT 1')
        .get(agentId)
    );
    return row ? toPerformanceRecord(row) : null;
  }

  async getRecentPerformance(agentId: string, limit: number): Promise<PerformanceRecord[]> {
    const rows = this.run('getRecentPerformance', () =>
      this.db
        .prepare('SELECT * FROM coaching_performance WHERE agent_id = ? ORDER BY created_at DESC, id DESC LIMIT ?')
        .all(agentId, limit)
    );
    return rows.map(toPerformanceRecord);
  }

  async getPerformanceTrend(agentId: string, sinceIso: string): Promise<PerformanceTrend> {
    const row = trendRowSchema.parse(
      this.run('getPerformanceTrend', () =>
        this.db
          .prepare(`
            SELECT COUNT(*) AS run_count, AVG(accuracy) AS avg_accuracy, SUM(accuracy * accuracy) AS sum_squares
            FROM coaching_performance
            WHERE agent_id = ? AND created_at > ?
          `)
          .get(agentId, sinceIso)
      )
    );

    const { run_count: n, avg_accuracy: avg, sum_squares: sumSquares } = row;
    if (n === 0 || avg === null) {
      return { avgAccuracy: null, stdAccuracy: null, runCount: 0 };
    }

    // Sample standard deviation; undefined for a single run.
    const variance = n > 1 && sumSquares !== null ? (sumSquares - n * avg * avg) / (n - 1) : null;
    return {
      avgAccuracy: avg,
      stdAccuracy: variance === null ? null : Math.sqrt(Math.max(0, variance)),
      runCount: n,
    };
  }

  async getGoldenExamples(agentId: string, limit: number): Promise<GoldenExample[]> {
    const rows = this.run('getGoldenExamples', () =>
      this.db
        .prepare(`
          SELECT * FROM golden_examples
          WHERE agent_id = ? AND is_active = 1
          ORDER BY accuracy_score DESC, id ASC
          LIMIT ?
        `)
        .all(agentId, limit)
    );
    return rows.map(toGoldenExample);
  }
}
