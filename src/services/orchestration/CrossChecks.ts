export type CrossCheckMode = { kind: 'exact' } | { kind: 'numeric'; tolerance: number };

/** Two agents that must agree on one field. */
export interface CrossCheck {
  agents: [string, string];
  field: string;
  mode: CrossCheckMode;
}

export const DEFAULT_CROSS_CHECKS: CrossCheck[] = [
  {
    agents: ['balance_sheet_agent', 'note_loans_agent'],
    field: 'long_term_debt',
    mode: { kind: 'numeric', tolerance: 1000 },
  },
  {
    agents: ['income_statement_agent', 'note_revenue_agent'],
    field: 'total_revenues',
    mode: { kind: 'numeric', tolerance: 1000 },
  },
  {
    agents: ['property_agent', 'governance_agent'],
    field: 'property_designation',
    mode: { kind: 'exact' },
  },
];
