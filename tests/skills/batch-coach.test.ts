import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { BatchCoach, loadManifest } from '../../src/skills/batch-coach/index.js';
import { ReinforcedCoach } from '../../src/services/coaching/ReinforcedCoach.js';
import { ExtractionOrchestrator } from '../../src/services/orchestration/ExtractionOrchestrator.js';
import { SQLiteCoachingStore } from '../../src/services/storage/SQLiteCoachingStore.js';
import { ValidationError } from '../../src/utils/errors.js';
import { ScriptedAdvisor, advice, fixedClock, noSleep } from '../helpers/fakes.js';

const governance = { chairman: 'Anna Berg', board_members: ['Anna Berg', 'Erik Lund', 'Sara Holm'], auditor_name: 'Per Ek', org_number: '769600-1234' };

describe('loadManifest', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  const writeManifest = (content: string): string => {
    const dir = mkdtempSync(join(tmpdir(), 'batch-coach-'));
    dirs.push(dir);
    const path = join(dir, 'manifest.json');
    writeFileSync(path, content);
    return path;
  };

  it('reads a valid manifest', async () => {
    const path = writeManifest(JSON.stringify({ items: [{ documentId: 'doc-1', agentId: 'governance_agent', extraction: governance }] }));

    const manifest = await loadManifest(path);

    expect(manifest.items[0]?.extraction).toEqual(governance);
  });

  it('rejects items without an extraction', async () => {
    const path = writeManifest(JSON.stringify({ items: [{ documentId: 'doc-1', agentId: 'governance_agent' }] }));

    await expect(loadManifest(path)).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects files that are not JSON', async () => {
    await expect(loadManifest(writeManifest('items: []'))).rejects.toThrow(/Cannot read manifest/);
  });
});

describe('BatchCoach', () => {
  it('validates every item when coaching is off', async () => {
    const batch = new BatchCoach(new ExtractionOrchestrator());

    const result = await batch.run({
      items: [
        { documentId: 'doc-1', agentId: 'governance_agent', extraction: governance },
        { documentId: 'doc-2', agentId: 'cash_flow_agent', extraction: {} },
      ],
    });

    expect(result.items.map(item => [item.status, item.valid])).toEqual([
      ['validated', true],
      ['validated', false],
    ]);
    expect(result.items[1]?.issues).toEqual(['Empty output from cash_flow_agent']);
    expect(result.summary).toEqual({ total: 2, coached: 0, validated: 2, failed: 0, byStrategy: {} });
  });

  it('coaches items and counts strategies', async () => {
    const store = new SQLiteCoachingStore(':memory:');
    const coach = new ReinforcedCoach({
      store,
      advisor: new ScriptedAdvisor([advice({ strategy: 'maintain', confidence: 0.9 })]),
      decisionOptions: { baseDelayMs: 0, sleep: noSleep },
      now: fixedClock('2024-06-10T10:00:00.000Z'),
    });

    const result = await new BatchCoach(new ExtractionOrchestrator({ coach }), coach).run({
      items: [
        { documentId: 'doc-1', agentId: 'governance_agent', extraction: governance, groundTruth: governance },
        { documentId: 'doc-1', agentId: 'governance_agent', extraction: governance },
      ],
    });
    await store.close();

    expect(result.items[0]).toMatchObject({ status: 'coached', strategy: 'maintain', initialAccuracy: 1, golden: false });
    // Same agent, document and second: the session id is already taken.
    expect(result.items[1]).toMatchObject({ status: 'failed', error: 'Coaching store startSession failed' });
    expect(result.summary).toEqual({ total: 2, coached: 1, validated: 0, failed: 1, byStrategy: { maintain: 1 } });
  });
});
