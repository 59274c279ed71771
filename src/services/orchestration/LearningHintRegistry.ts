import { logger } from '../../utils/logger.js';
import { generateId } from '../../utils/uuid.js';
import type { Improvement, LearningEntry } from '../../types/orchestration.types.js';

interface AgentLearning {
  failures: LearningEntry[];
  hints: string[];
}

const mentions = (issues: string[], marker: string): boolean => issues.some(issue => issue.includes(marker));

const EMPTY_OUTPUT_FEEDBACK = [
  '- Add fallback search terms in Swedish and English',
  '- Look for tables and lists, not just text',
  '- Check multiple pages if section spans pages',
  '- Try OCR-friendly extraction for scanned documents',
];

const MISSING_FIELDS_FEEDBACK = [
  '- Search for field variations:',
  '  * ordförande/styrelseordförande/chairman',
  '  * årsstämma/bolagsstämma/stämma',
  '  * revisor/auktoriserad revisor/godkänd revisor',
  '- Check if data is in a table format',
  '- Look in both current and previous year columns',
];

const EMPTY_FIELDS_FEEDBACK = [
  '- Section might be incorrectly identified',
  '- Data might be on adjacent pages',
  '- Consider that some documents use different terminology',
  '- Check if this is a summary vs detailed section',
];

/**
 * Per-agent memory of validation failures. Each failure yields improvement
 * suggestions and, from the first one, a hint handed to the agent's next run.
 * Process-local; nothing is persisted.
 */
export class LearningHintRegistry {
  private learning = new Map<string, AgentLearning>();

  constructor(private now: () => Date = () => new Date()) {}

  learnFromFailure(agent: string, issues: string[], sectionContent = ''): LearningEntry {
    const entry: LearningEntry = {
      id: generateId('learn'),
      timestamp: this.now().toISOString(),
      agent,
      issues,
      improvements: this.suggestImprovements(issues, sectionContent),
    };

    const record = this.learning.get(agent) ?? { failures: [], hints: [] };
    record.failures.push(entry);

    const [first] = entry.improvements;
    if (first) {
      record.hints.push(`${first.type}: ${first.hint}`);
    }
    this.learning.set(agent, record);

    logger.debug({ agent, issues: issues.length, improvements: entry.improvements.length }, 'Learned from failure');
    return entry;
  }

  getHints(agent: string): string[] {
    return [...(this.learning.get(agent)?.hints ?? [])];
  }

  getFailures(agent: string): LearningEntry[] {
    return [...(this.learning.get(agent)?.failures ?? [])];
  }

  generateCoachingFeedback(agent: string, issues: string[]): string {
    const lines = [`Coaching for ${agent}:`];

    if (mentions(issues, 'Empty output')) lines.push(...EMPTY_OUTPUT_FEEDBACK);
    if (mentions(issues, 'Missing fields')) lines.push(...MISSING_FIELDS_FEEDBACK);
    if (mentions(issues, 'Too many empty')) lines.push(...EMPTY_FIELDS_FEEDBACK);

    return lines.join('\n');
  }

  private suggestImprovements(issues: string[], sectionContent: string): Improvement[] {
    const improvements: Improvement[] = [];

    if (mentions(issues, 'Empty output')) {
      improvements.push({
        type: 'prompt_enhancement',
        suggestion: 'Add more specific Swedish terms to search for',
        hint: 'Check if section contains tables that need special handling',
      });
      if (sectionContent.toLowerCase().includes('tabell')) {
        improvements.push({
          type: 'table_detection',
          suggestion: 'Section contains table - use table extractor',
          hint: 'Tables need specialized extraction logic',
        });
      }
    }

    if (mentions(issues, 'Missing fields')) {
      improvements.push({
        type: 'field_mapping',
        suggestion: 'Update field mappings for Swedish variations',
        hint: 'Common variations: årsstämma/stämma, ordförande/ordf',
      });
    }

    if (mentions(issues, 'Failed validation')) {
      improvements.push({
        type: 'calculation_check',
        suggestion: 'Check for rounding or thousands separator issues',
        hint: 'Swedish uses space as thousands separator',
      });
    }

    return improvements;
  }
}
