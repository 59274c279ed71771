import { hasField, toAmount } from '../../utils/values.js';
import type { ExtractionRecord } from '../../types/coaching.types.js';

export interface ValidationRule {
  name: string;
  agents: string[];
  description: string;
  check(output: ExtractionRecord): boolean;
}

/** Missing fields read as 0; present but unreadable values read as null. */
const readAmount = (output: ExtractionRecord, field: string): number | null =>
  hasField(output, field) ? toAmount(output[field]) : 0;

interface Term {
  field: string;
  sign: 1 | -1;
}

export function balanceRule(
  name: string,
  agents: string[],
  target: string,
  terms: Term[],
  tolerance: number
): ValidationRule {
  const expression = terms
    .map((term, index) => `${index === 0 ? (term.sign < 0 ? '-' : '') : term.sign < 0 ? ' - ' : ' + '}${term.field}`)
    .join('');

  return {
    name,
    agents,
    description: `${target} == ${expression} (±${tolerance})`,
    check(output) {
      const expected = readAmount(output, target);
      if (expected === null) return false;

      let total = 0;
      for (const term of terms) {
        const amount = readAmount(output, term.field);
        if (amount === null) return false;
        total += term.sign * amount;
      }
      return Math.abs(expected - total) <= tolerance;
    },
  };
}

export function minCountRule(name: string, agents: string[], field: string, minimum: number): ValidationRule {
  return {
    name,
    agents,
    description: `len(${field}) >= ${minimum}`,
    check(output) {
      const value = hasField(output, field) ? output[field] : [];
      return Array.isArray(value) && value.length >= minimum;
    },
  };
}

const ITEM_AMOUNT_KEYS = ['amount', 'balance', 'belopp'];

const itemAmount = (item: unknown): number | null => {
  if (typeof item === 'number' || typeof item === 'string') {
    return toAmount(item);
  }
  if (typeof item === 'object' && item !== null && !Array.isArray(item)) {
    const key = ITEM_AMOUNT_KEYS.find(candidate => candidate in item);
    return key ? toAmount(Object.getOwnPropertyDescriptor(item, key)?.value) : null;
  }
  return null;
};

export function sumRule(
  name: string,
  agents: string[],
  itemsField: string,
  totalField: string,
  tolerance: number
): ValidationRule {
  return {
    name,
    agents,
    description: `sum(${itemsField}) == ${totalField} (±${tolerance})`,
    check(output) {
      const items = hasField(output, itemsField) ? output[itemsField] : [];
      const total = readAmount(output, totalField);
      if (!Array.isArray(items) || total === null) return false;

      let sum = 0;
      for (const item of items) {
        const amount = itemAmount(item);
        if (amount === null) return false;
        sum += amount;
      }
      return Math.abs(sum - total) <= tolerance;
    },
  };
}

export const DEFAULT_VALIDATION_RULES: ValidationRule[] = [
  balanceRule(
    'balance_check',
    ['balance_sheet_agent'],
    'total_assets',
    [
      { field: 'total_equity', sign: 1 },
      { field: 'total_liabilities', sign: 1 },
    ],
    1000
  ),
  balanceRule(
    'cash_flow_check',
    ['cash_flow_agent'],
    'closing_cash',
    [
      { field: 'opening_cash', sign: 1 },
      { field: 'total_cash_flow', sign: 1 },
    ],
    100
  ),
  balanceRule(
    'income_check',
    ['income_statement_agent'],
    'net_income',
    [
      { field: 'total_revenues', sign: 1 },
      { field: 'total_costs', sign: -1 },
    ],
    1000
  ),
  // Swedish law requires at least three board members.
  minCountRule('board_members_check', ['governance_agent'], 'board_members', 3),
  sumRule('loan_total_check', ['note_loans_agent'], 'loans', 'total_loans', 1000),
];

/** Agent name -> rules that apply to it, built once. */
export function buildRuleRegistry(rules: ValidationRule[]): Map<string, ValidationRule[]> {
  const registry = new Map<string, ValidationRule[]>();
  for (const rule of rules) {
    for (const agent of rule.agents) {
      registry.set(agent, [...(registry.get(agent) ?? []), rule]);
    }
  }
  return registry;
}
