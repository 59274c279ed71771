import { readFile } from 'fs/promises';
import { logger } from '../../utils/logger.js';
import { ValidationError, errorMessage } from '../../utils/errors.js';
import type { ReinforcedCoach } from '../../services/coaching/ReinforcedCoach.js';
import type { ExtractionOrchestrator } from '../../services/orchestration/ExtractionOrchestrator.js';
import { manifestSchema, type BatchCoachResult, type ItemSummary, type Manifest, type ManifestItem } from './types.js';

export async function loadManifest(path: string): Promise<Manifest> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Cannot read manifest ${path}: ${errorMessage(error)}`);
  }

  const result = manifestSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid manifest ${path}`, result.error.issues);
  }
  return result.data;
}

/**
 * Validates and coaches each manifest item in order. A failing item is
 * reported and the batch moves on.
 */
export class BatchCoach {
  constructor(
    private orchestrator: ExtractionOrchestrator,
    private coach?: ReinforcedCoach
  ) {}

  async run(manifest: Manifest): Promise<BatchCoachResult> {
    const items: ItemSummary[] = [];
    for (const item of manifest.items) {
      items.push(await this.processItem(item));
    }

    const byStrategy: BatchCoachResult['summary']['byStrategy'] = {};
    for (const item of items) {
      if (item.strategy) {
        byStrategy[item.strategy] = (byStrategy[item.strategy] ?? 0) + 1;
      }
    }

    return {
      items,
      summary: {
        total: items.length,
        coached: items.filter(item => item.status === 'coached').length,
        validated: items.filter(item => item.status === 'validated').length,
        failed: items.filter(item => item.status === 'failed').length,
        byStrategy,
      },
    };
  }

  private async processItem(item: ManifestItem): Promise<ItemSummary> {
    const { documentId, agentId } = item;
    const { validation } = this.orchestrator.reviewAgentOutput(agentId, item.extraction);
    const base = { documentId, agentId, valid: validation.isValid, issues: validation.issues };

    if (!this.coach) {
      return { ...base, status: 'validated' };
    }

    try {
      const result = await this.coach.coach({
        documentId,
        agentId,
        extraction: item.extraction,
        groundTruth: item.groundTruth,
        basePrompt: item.basePrompt,
      });

      return {
        ...base,
        status: 'coached',
        sessionId: result.sessionId,
        strategy: result.decision.strategy,
        initialAccuracy: result.initialPerformance.accuracy,
        finalAccuracy: result.finalPerformance.accuracy,
        improvement: result.improvement,
        golden: result.promotedToGolden,
      };
    } catch (error) {
      logger.warn({ documentId, agentId, error: errorMessage(error) }, 'Batch item coaching failed');
      return { ...base, status: 'failed', error: errorMessage(error) };
    }
  }
}
