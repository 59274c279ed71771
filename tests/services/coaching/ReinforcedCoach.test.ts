import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ReinforcedCoach } from '../../../src/services/coaching/ReinforcedCoach.js';
import { PerformanceAnalyzer } from '../../../src/services/coaching/PerformanceAnalyzer.js';
import { SQLiteCoachingStore } from '../../../src/services/storage/SQLiteCoachingStore.js';
import { CoachingPersistenceError, ValidationError } from '../../../src/utils/errors.js';
import { ScriptedAdvisor, advice, fixedClock, noSleep } from '../../helpers/fakes.js';
import type { ReextractFn } from '../../../src/types/coaching.types.js';

const AGENT = 'note_loans_agent';

const truth = { loans: ['SEB', 'Swedbank'], total_loans: 3500000, weighted_avg_rate: 2.4, lender_count: 2 };
const flawed = { loans: ['SEB', 'Swedbank'], total_loans: 3400000, weighted_avg_rate: 2.4, lender_count: 2 };

/** Ground truth with 100 numbered fields and an extraction that gets `correct` of them right. */
const wideCase = (correct: number) => {
  const groundTruth = Object.fromEntries(Array.from({ length: 100 }, (_, i) => [`field_${i}`, i]));
  const extraction = Object.fromEntries(Array.from({ length: 100 }, (_, i) => [`field_${i}`, i < correct ? i : -1]));
  return { groundTruth, extraction };
};

describe('ReinforcedCoach', () => {
  let store: SQLiteCoachingStore;

  const coachWith = (script: Array<string | Error>) => {
    const advisor = new ScriptedAdvisor(script);
    const coach = new ReinforcedCoach({
      store,
      advisor,
      analyzer: new PerformanceAnalyzer({ selfEvaluationDiscount: 0.8 }),
      decisionOptions: { maxAttempts: 3, baseDelayMs: 0, maxRoundsFor: () => 5, sleep: noSleep },
      now: fixedClock('2024-06-10T10:00:00.000Z'),
    });
    return { coach, advisor };
  };

  beforeEach(() => {
    store = new SQLiteCoachingStore(':memory:');
  });

  afterEach(async () => {
    await store.close();
  });

  it('keeps the extraction on maintain and records the run', async () => {
    const { coach } = coachWith([advice({ strategy: 'maintain', confidence: 0.9 })]);

    const result = await coach.coach({ documentId: 'doc-1', agentId: AGENT, extraction: truth, groundTruth: truth });

    expect(result.sessionId).toMatch(/^note_loans_agent_doc-1_20240610_100000_000_[0-9a-f]{8}$/);
    expect(result.extraction).toEqual(truth);
    expect(result.extraction).not.toBe(truth);
    expect(result.decision.strategy).toBe('maintain');
    expect(result.improvement).toBe(0);
    expect(result.promotedToGolden).toBe(false);

    expect(await coach.getSession(result.sessionId)).toMatchObject({
      status: 'completed',
      roundsCompleted: 0,
      advisorCalls: 1,
      initialAccuracy: 1,
      finalAccuracy: 1,
    });
    const [run] = await store.getRecentPerformance(AGENT, 5);
    expect(run).toMatchObject({ strategy: 'maintain', improvementDelta: 0, accuracy: 1, coachingRound: 1 });
    expect(await coach.currentPhase()).toBe('exploration');
  });

  it('re-extracts on refine and stores a golden result', async () => {
    const { coach } = coachWith([advice({ strategy: 'refine', new_prompt: 'Sum every loan in Not 12', confidence: 0.8 })]);
    const reextract = vi.fn<ReextractFn>(async () => ({ ...truth }));

    const result = await coach.coach({
      documentId: 'doc-1',
      agentId: AGENT,
      extraction: flawed,
      groundTruth: truth,
      basePrompt: 'Extract the loans note',
      hints: ['calculation_check: Swedish uses space as thousands separator'],
      reextract,
    });

    expect(reextract).toHaveBeenCalledWith({
      documentId: 'doc-1',
      agentId: AGENT,
      strategy: 'refine',
      basePrompt: 'Extract the loans note',
      refinedPrompt: 'Sum every loan in Not 12',
      examples: [],
      hints: ['calculation_check: Swedish uses space as thousands separator'],
    });
    expect(result.initialPerformance.accuracy).toBe(0.75);
    expect(result.finalPerformance.accuracy).toBe(1);
    expect(result.improvement).toBe(0.25);
    expect(result.promotedToGolden).toBe(true);

    expect(await coach.getSession(result.sessionId)).toMatchObject({ status: 'completed', roundsCompleted: 1 });
    expect(await store.countCoachedRounds('doc-1', AGENT)).toBe(1);
    expect((await store.getGoldenExamples(AGENT, 5)).map(example => example.extraction)).toEqual([truth]);
  });

  it('promotes at 0.97 accuracy but not at 0.93', async () => {
    const { coach } = coachWith([advice({ strategy: 'explore', confidence: 0.6 })]);

    for (const [documentId, correct] of [['doc-high', 97], ['doc-low', 93]] as const) {
      const { groundTruth, extraction } = wideCase(correct);
      const result = await coach.coach({
        documentId,
        agentId: AGENT,
        extraction: {},
        groundTruth,
        reextract: async () => extraction,
      });
      expect(result.finalPerformance.accuracy).toBe(correct / 100);
    }

    const golden = await store.getGoldenExamples(AGENT, 10);
    expect(golden.map(example => example.documentId)).toEqual(['doc-high']);
  });

  it('restores a stored round on revert', async () => {
    const { coach, advisor } = coachWith([
      advice({ strategy: 'refine', new_prompt: 'Check Not 12', confidence: 0.8 }),
      advice({ strategy: 'revert', target_round: 1, confidence: 0.9 }),
    ]);
    const worse = { loans: [], total_loans: 0, weighted_avg_rate: 2.4, lender_count: 0 };

    await coach.coach({
      documentId: 'doc-1',
      agentId: AGENT,
      sessionId: 'first',
      extraction: flawed,
      groundTruth: truth,
      reextract: async () => worse,
    });
    const result = await coach.coach({
      documentId: 'doc-1',
      agentId: AGENT,
      sessionId: 'second',
      extraction: worse,
      groundTruth: truth,
    });

    expect(advisor.requests[1]?.userPrompt).toContain('- Round 1: not scored\n- Round 2: 25.00%\n- Round 3: not scored\n');
    expect(result.decision).toMatchObject({ strategy: 'revert', targetRound: 1 });
    expect(result.extraction).toEqual(flawed);
    expect(result.finalPerformance.accuracy).toBe(0.75);
  });

  it('keeps the extraction when a revert target is missing', async () => {
    const { coach } = coachWith([advice({ strategy: 'revert', target_round: 9 })]);

    const result = await coach.coach({ documentId: 'doc-1', agentId: AGENT, extraction: flawed, groundTruth: truth });

    expect(result.extraction).toEqual(flawed);
    expect(result.improvement).toBe(0);
  });

  it('falls back when the advisor stays down', async () => {
    const { coach, advisor } = coachWith([new Error('connect ECONNREFUSED')]);

    const result = await coach.coach({ documentId: 'doc-1', agentId: AGENT, extraction: { total_loans: 1 }, groundTruth: truth });

    expect(advisor.calls).toBe(3);
    expect(result.decision).toMatchObject({ strategy: 'explore', source: 'fallback', confidence: 0.5 });
    expect(result.extraction).toEqual({ total_loans: 1 });
    expect(await coach.getSession(result.sessionId)).toMatchObject({ status: 'completed', advisorCalls: 3 });
  });

  it('marks the session failed and rethrows when re-extraction fails', async () => {
    const { coach } = coachWith([advice({ strategy: 'explore' })]);

    await expect(
      coach.coach({
        documentId: 'doc-1',
        agentId: AGENT,
        sessionId: 'failing',
        extraction: flawed,
        groundTruth: truth,
        reextract: async () => {
          throw new Error('extractor offline');
        },
      })
    ).rejects.toThrow('extractor offline');

    expect(await coach.getSession('failing')).toMatchObject({ status: 'failed', failureReason: 'extractor offline' });
    expect(await store.getRecentPerformance(AGENT, 5)).toEqual([]);
  });

  it('coaches the same pair twice at the same instant', async () => {
    const { coach } = coachWith([advice({ strategy: 'maintain', confidence: 0.9 })]);

    const first = await coach.coach({ documentId: 'doc-1', agentId: AGENT, extraction: flawed, groundTruth: truth });
    const second = await coach.coach({ documentId: 'doc-1', agentId: AGENT, extraction: flawed, groundTruth: truth });

    expect(second.sessionId).not.toBe(first.sessionId);
    expect(await coach.getSession(first.sessionId)).toMatchObject({ status: 'completed' });
    expect(await coach.getSession(second.sessionId)).toMatchObject({ status: 'completed' });
    expect(await store.getRecentPerformance(AGENT, 5)).toHaveLength(2);
  });

  it('marks the session failed when recording the outcome fails', async () => {
    const { coach } = coachWith([advice({ strategy: 'explore', confidence: 0.6 })]);
    vi.spyOn(store, 'recordPerformance').mockRejectedValueOnce(
      new CoachingPersistenceError('Coaching store recordPerformance failed')
    );

    await expect(
      coach.coach({
        documentId: 'doc-1',
        agentId: AGENT,
        sessionId: 'store-down',
        extraction: flawed,
        groundTruth: truth,
        reextract: async () => ({ ...truth }),
      })
    ).rejects.toBeInstanceOf(CoachingPersistenceError);

    expect(await coach.getSession('store-down')).toMatchObject({
      status: 'failed',
      failureReason: 'Coaching store recordPerformance failed',
    });
    expect(await store.getRecentPerformance(AGENT, 5)).toEqual([]);
    expect(await store.getGoldenExamples(AGENT, 5)).toEqual([]);
  });

  it('marks the session failed when storing a golden example fails', async () => {
    const { coach } = coachWith([advice({ strategy: 'explore', confidence: 0.6 })]);
    vi.spyOn(store, 'addGoldenExample').mockRejectedValueOnce(
      new CoachingPersistenceError('Coaching store addGoldenExample failed')
    );

    await expect(
      coach.coach({
        documentId: 'doc-1',
        agentId: AGENT,
        sessionId: 'golden-down',
        extraction: flawed,
        groundTruth: truth,
        reextract: async () => ({ ...truth }),
      })
    ).rejects.toThrow('Coaching store addGoldenExample failed');

    expect(await coach.getSession('golden-down')).toMatchObject({
      status: 'failed',
      failureReason: 'Coaching store addGoldenExample failed',
    });
    expect(await store.getRecentPerformance(AGENT, 5)).toHaveLength(1);
  });

  it('rejects a re-extraction that is not an object', async () => {
    const { coach } = coachWith([advice({ strategy: 'explore' })]);

    await expect(
      coach.coach({
        documentId: 'doc-1',
        agentId: AGENT,
        sessionId: 'bad-shape',
        extraction: flawed,
        groundTruth: truth,
        reextract: async () => JSON.parse('[1, 2]'),
      })
    ).rejects.toBeInstanceOf(ValidationError);

    expect(await coach.getSession('bad-shape')).toMatchObject({ status: 'failed' });
  });

  it('stops acting once the round budget is used', async () => {
    const { coach, advisor } = coachWith([advice({ strategy: 'explore', confidence: 0.9 })]);

    for (let i = 0; i < 6; i++) {
      await coach.coach({
        documentId: 'doc-1',
        agentId: AGENT,
        sessionId: `round-${i}`,
        extraction: flawed,
        groundTruth: truth,
      });
    }

    expect(advisor.calls).toBe(6);
    const last = await store.getRecentPerformance(AGENT, 1);
    expect(await store.countCoachedRounds('doc-1', AGENT)).toBe(5);
    expect(last[0]?.strategy).toBe('maintain');
  });
});
