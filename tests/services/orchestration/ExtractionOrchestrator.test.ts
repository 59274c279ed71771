import { describe, it, expect, afterEach } from 'vitest';
import { ExtractionOrchestrator, MAX_SECTION_PAGES } from '../../../src/services/orchestration/ExtractionOrchestrator.js';
import { ReinforcedCoach } from '../../../src/services/coaching/ReinforcedCoach.js';
import { SQLiteCoachingStore } from '../../../src/services/storage/SQLiteCoachingStore.js';
import { ScriptedAdvisor, advice, fixedClock, noSleep } from '../../helpers/fakes.js';

describe('ExtractionOrchestrator', () => {
  const stores: SQLiteCoachingStore[] = [];

  const coachWith = (script: string[]) => {
    const store = new SQLiteCoachingStore(':memory:');
    stores.push(store);
    return new ReinforcedCoach({
      store,
      advisor: new ScriptedAdvisor(script),
      decisionOptions: { baseDelayMs: 0, sleep: noSleep },
      now: fixedClock('2024-06-10T10:00:00.000Z'),
    });
  };

  afterEach(async () => {
    await Promise.all(stores.splice(0).map(store => store.close()));
  });

  it('builds assignments with pages, zone, priority and expected fields', () => {
    const orchestrator = new ExtractionOrchestrator();
    const section = { name: 'Resultaträkning', startPage: 5, endPage: 7 };

    expect(orchestrator.mapSectionsToAgents([section])).toEqual({
      income_statement_agent: {
        sections: [section],
        pages: [5, 6, 7],
        extractionZone: { start: 5, end: 7 },
        priority: 1,
        expectedOutput: ['annual_fees', 'total_revenues', 'net_income'],
      },
    });
  });

  it('defaults unpaged sections to page 1 and merges overlapping pages', () => {
    const orchestrator = new ExtractionOrchestrator();

    const assignments = orchestrator.mapSectionsToAgents([
      { name: 'Noter' },
      { name: 'Skulder till kreditinstitut', startPage: 1, endPage: 2 },
    ]);

    expect(assignments['note_loans_agent']?.pages).toEqual([1, 2]);
    expect(assignments['note_loans_agent']?.priority).toBe(2);
  });

  it('spans a very wide section without listing every page', () => {
    const orchestrator = new ExtractionOrchestrator();

    const assignment = orchestrator.mapSectionsToAgents([{ name: 'Resultaträkning', startPage: 1, endPage: 200000 }])[
      'income_statement_agent'
    ];

    expect(assignment?.extractionZone).toEqual({ start: 1, end: 200000 });
    expect(assignment?.pages).toHaveLength(MAX_SECTION_PAGES);
    expect(assignment?.pages[0]).toBe(1);
    expect(assignment?.pages.at(-1)).toBe(MAX_SECTION_PAGES);
  });

  it('takes the zone from the outermost section bounds', () => {
    const orchestrator = new ExtractionOrchestrator();

    const assignments = orchestrator.mapSectionsToAgents([
      { name: 'Resultaträkning', startPage: 9, endPage: 12 },
      { name: 'Resultaträkning forts.', page: 4 },
    ]);

    expect(assignments['income_statement_agent']?.extractionZone).toEqual({ start: 4, end: 12 });
    expect(assignments['income_statement_agent']?.pages).toEqual([4, 9, 10, 11, 12]);
  });

  it('attaches hints learned from earlier failures', () => {
    const orchestrator = new ExtractionOrchestrator();
    orchestrator.learnFromFailure('income_statement_agent', ['Missing fields: [net_income]']);

    const assignments = orchestrator.mapSectionsToAgents([{ name: 'Resultaträkning', page: 5 }]);

    expect(assignments['income_statement_agent']?.learningHints).toEqual([
      'field_mapping: Common variations: årsstämma/stämma, ordförande/ordf',
    ]);
  });

  it('plans batches with its configured parallelism', () => {
    const orchestrator = new ExtractionOrchestrator({ maxParallel: 1 });
    const assignments = orchestrator.mapSectionsToAgents([
      { name: 'Resultaträkning', page: 5 },
      { name: 'Balansräkning', page: 6 },
    ]);

    expect(orchestrator.generateExecutionPlan(assignments)).toEqual([['income_statement_agent'], ['balance_sheet_agent']]);
  });

  it('learns from a failed review', () => {
    const orchestrator = new ExtractionOrchestrator();

    const review = orchestrator.reviewAgentOutput('cash_flow_agent', {});

    expect(review.validation).toEqual({ isValid: false, issues: ['Empty output from cash_flow_agent'] });
    expect(review.learning?.improvements[0]?.type).toBe('prompt_enhancement');
  });

  it('passes a valid review without learning', () => {
    const orchestrator = new ExtractionOrchestrator();

    const review = orchestrator.reviewAgentOutput('cash_flow_agent', {
      operating_activities: 250000,
      opening_cash: 1000000,
      total_cash_flow: 250000,
      closing_cash: 1250000,
    });

    expect(review).toEqual({ validation: { isValid: true, issues: [] }, learning: null });
  });

  it('returns the extraction untouched without a coach', async () => {
    const extraction = { chairman: 'Anna Berg' };

    expect(await new ExtractionOrchestrator().processWithCoaching('doc-1', 'governance_agent', extraction)).toBe(extraction);
  });

  it('returns the coached extraction', async () => {
    const coach = coachWith([advice({ strategy: 'explore', confidence: 0.7 })]);
    const orchestrator = new ExtractionOrchestrator({ coach });
    const truth = { chairman: 'Anna Berg', org_number: '769600-1234' };

    const result = await orchestrator.processWithCoaching('doc-1', 'governance_agent', { chairman: 'Anna' }, truth, {
      reextract: async () => truth,
    });

    expect(result).toEqual(truth);
  });

  it('falls back to the original extraction when coaching fails', async () => {
    const coach = coachWith([advice({ strategy: 'explore', confidence: 0.7 })]);
    const orchestrator = new ExtractionOrchestrator({ coach });
    const extraction = { chairman: 'Anna' };

    const result = await orchestrator.processWithCoaching('doc-1', 'governance_agent', extraction, undefined, {
      reextract: async () => {
        throw new Error('model timeout');
      },
    });

    expect(result).toBe(extraction);
  });
});
