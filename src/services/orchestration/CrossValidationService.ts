import { isDeepStrictEqual } from 'util';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { hasField, isBlank, isRecord, toAmount } from '../../utils/values.js';
import { DEFAULT_VALIDATION_RULES, buildRuleRegistry, type ValidationRule } from './ValidationRules.js';
import { DEFAULT_CROSS_CHECKS, type CrossCheck } from './CrossChecks.js';
import type { ExtractionRecord } from '../../types/coaching.types.js';
import type { AgentResults, CrossCheckMismatch, ValidationResult } from '../../types/orchestration.types.js';

const EMPTY_FIELD_RATIO = 0.5;

const formatFields = (fields: string[]): string => `[${fields.join(', ')}]`;

export class CrossValidationService {
  private rulesByAgent: Map<string, ValidationRule[]>;

  constructor(
    rules: ValidationRule[] = DEFAULT_VALIDATION_RULES,
    private crossChecks: CrossCheck[] = DEFAULT_CROSS_CHECKS
  ) {
    this.rulesByAgent = buildRuleRegistry(rules);
  }

  rulesFor(agentName: string): ValidationRule[] {
    return this.rulesByAgent.get(agentName) ?? [];
  }

  validate(agentName: string, output: unknown, expectedFields: string[]): ValidationResult {
    if (!isRecord(output) || Object.keys(output).length === 0) {
      return { isValid: false, issues: [`Empty output from ${agentName}`] };
    }

    const issues: string[] = [];
    const missing = expectedFields.filter(field => !hasField(output, field));
    const empty = expectedFields.filter(field => hasField(output, field) && isBlank(output[field]));

    if (missing.length > 0) {
      issues.push(`Missing fields: ${formatFields(missing)}`);
    }
    if (empty.length > expectedFields.length * EMPTY_FIELD_RATIO) {
      issues.push(`Too many empty fields: ${formatFields(empty)}`);
    }

    for (const rule of this.rulesFor(agentName)) {
      if (!this.passes(rule, output)) {
        issues.push(`Failed validation: ${rule.name}`);
      }
    }

    return { isValid: issues.length === 0, issues };
  }

  /** Mismatches between agents that report the same figure. Pairs with a missing agent are skipped. */
  crossValidate(results: AgentResults): CrossCheckMismatch[] {
    const mismatches: CrossCheckMismatch[] = [];

    for (const check of this.crossChecks) {
      const [first, second] = check.agents;
      const left = results[first];
      const right = results[second];
      if (!isRecord(left) || !isRecord(right)) continue;

      const values: [unknown, unknown] = [left[check.field], right[check.field]];
      const mismatch = this.compare(check, values);
      if (mismatch) {
        mismatches.push(mismatch);
      }
    }

    return mismatches;
  }

  private compare(check: CrossCheck, values: [unknown, unknown]): CrossCheckMismatch | null {
    const base = {
      type: 'mismatch' as const,
      agents: check.agents,
      field: check.field,
      values,
      severity: 'warning' as const,
    };

    if (check.mode.kind === 'exact') {
      return isDeepStrictEqual(values[0], values[1]) ? null : base;
    }

    if (values[0] === null || values[0] === undefined || values[1] === null || values[1] === undefined) {
      return null;
    }

    const a = toAmount(values[0]);
    const b = toAmount(values[1]);
    if (a === null || b === null) {
      return base;
    }

    const difference = Math.abs(a - b);
    return difference > check.mode.tolerance ? { ...base, difference } : null;
  }

  private passes(rule: ValidationRule, output: ExtractionRecord): boolean {
    try {
      return rule.check(output);
    } catch (error) {
      logger.warn({ rule: rule.name, error: errorMessage(error) }, 'Validation rule error');
      return false;
    }
  }
}
