import type { ExtractionPerformance, HistoricalContext, RoundSummary } from '../../../types/coaching.types.js';
import { PHASE_GOALS } from '../../coaching/PhasePolicy.js';

export const COACHING_DECISION_SYSTEM_PROMPT = `You coach LLM extraction agents that read Swedish housing association (BRF) annual reports.

Given an agent's current performance, its history and the learning phase, choose ONE coaching strategy:
- "maintain": keep the current prompt
- "refine": keep the approach, rewrite the prompt (put the rewrite in "new_prompt")
- "explore": try a different extraction approach
- "revert": restore the extraction of an earlier round (put the round number in "target_round")

GUIDELINES:
- If current accuracy is more than 10 percentage points below the best-ever accuracy, consider "revert"
- If the last 5 runs show no improvement (local maximum), consider "explore"
- If accuracy is above 95%, use "maintain"
- In the Convergence and Golden phases prefer "maintain" unless a substantial improvement is likely

OUTPUT FORMAT:
Return valid JSON only:
{
  "strategy": "revert|refine|explore|maintain",
  "target_round": null or integer,
  "new_prompt": null or string,
  "examples": [] or list of example extraction objects,
  "reasoning": "why this strategy",
  "confidence": 0.0-1.0
}`;

const pct = (value: number): string => `${(value * 100).toFixed(2)}%`;

const PHASE_LABELS = {
  exploration: 'Exploration',
  optimization: 'Optimization',
  convergence: 'Convergence',
  golden: 'Golden',
} as const;

const LISTED_ROUNDS = 10;

const roundLines = (rounds: RoundSummary[]): string =>
  rounds.length > 0
    ? rounds
        .slice(-LISTED_ROUNDS)
        .map(r => `- Round ${r.round}: ${r.accuracy !== null ? pct(r.accuracy) : 'not scored'}`)
        .join('\n')
    : '- None';

export interface CoachingPromptInput {
  agentId: string;
  performance: ExtractionPerformance;
  context: HistoricalContext;
}

export const COACHING_DECISION_USER_PROMPT = ({ agentId, performance, context }: CoachingPromptInput) => {
  const recent = context.recentRuns;
  const recentAverage = recent.length > 0
    ? pct(recent.reduce((sum, run) => sum + run.accuracy, 0) / recent.length)
    : 'No history';

  return `
Agent: ${agentId}
Learning Phase: ${PHASE_LABELS[context.learningPhase]} (${context.processedDocuments} documents processed)

CURRENT PERFORMANCE:
- Accuracy: ${pct(performance.accuracy)}
- Coverage: ${pct(performance.coverage)}
- F1 Score: ${pct(performance.f1Score)}
- Errors: ${performance.errors.length > 0 ? JSON.stringify(performance.errors.slice(0, 5)) : 'None'}
- Missing Fields: ${performance.missingFields.length > 0 ? JSON.stringify(performance.missingFields.slice(0, 5)) : 'None'}

HISTORICAL CONTEXT:
- Best Ever Accuracy: ${context.bestEver ? pct(context.bestEver.accuracy) : 'No history'}
- Recent Average (last ${recent.length} runs): ${recentAverage}
- Recent Accuracies: ${recent.length > 0 ? recent.map(run => pct(run.accuracy)).join(', ') : 'None'}
- 7-day Trend: ${context.trend.avgAccuracy !== null ? `${pct(context.trend.avgAccuracy)} over ${context.trend.runCount} runs` : 'No runs'}
- 7-day Std Dev: ${context.trend.stdAccuracy !== null ? pct(context.trend.stdAccuracy) : 'n/a'}
- Golden Examples Available: ${context.goldenExamples.length}

STORED ROUNDS FOR THIS DOCUMENT (a "revert" target_round must be one of these):
${roundLines(context.documentRounds)}

PHASE GOAL: ${PHASE_GOALS[context.learningPhase]}

Recommend a coaching strategy. Return valid JSON only.
`;
};
