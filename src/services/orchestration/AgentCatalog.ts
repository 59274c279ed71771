export interface AgentProfile {
  priority: number;
  expectedFields: string[];
  maxRounds: number;
}

const DEFAULT_PRIORITY = 4;
const DEFAULT_MAX_ROUNDS = 5;

export const AGENT_CATALOG: Record<string, AgentProfile> = {
  sectionizer: { priority: DEFAULT_PRIORITY, expectedFields: [], maxRounds: 2 },
  governance_agent: {
    priority: 1,
    expectedFields: ['chairman', 'board_members', 'auditor_name', 'org_number'],
    maxRounds: 5,
  },
  income_statement_agent: {
    priority: 1,
    expectedFields: ['annual_fees', 'total_revenues', 'net_income'],
    maxRounds: 5,
  },
  balance_sheet_agent: {
    priority: 1,
    expectedFields: ['total_assets', 'total_equity', 'total_liabilities', 'cash_and_bank'],
    maxRounds: 5,
  },
  cash_flow_agent: { priority: 1, expectedFields: ['operating_activities', 'closing_cash'], maxRounds: 5 },
  property_agent: {
    priority: 2,
    expectedFields: ['property_designation', 'address', 'apartments_count'],
    maxRounds: 5,
  },
  multi_year_overview_agent: {
    priority: 2,
    expectedFields: ['years', 'net_revenue', 'solidity_percent'],
    maxRounds: 5,
  },
  maintenance_events_agent: { priority: 2, expectedFields: [], maxRounds: 5 },
  note_loans_agent: { priority: 2, expectedFields: ['loans', 'total_loans', 'weighted_avg_rate'], maxRounds: 5 },
  note_depreciation_agent: { priority: 2, expectedFields: [], maxRounds: 5 },
  note_costs_agent: { priority: 2, expectedFields: [], maxRounds: 5 },
  note_revenue_agent: { priority: 2, expectedFields: [], maxRounds: 5 },
  suppliers_vendors_agent: {
    priority: 2,
    expectedFields: ['banking', 'insurance', 'utilities', 'property_services'],
    maxRounds: 5,
  },
  audit_report_agent: { priority: 3, expectedFields: [], maxRounds: 5 },
  ratio_kpi_agent: { priority: 3, expectedFields: [], maxRounds: 5 },
  member_info_agent: { priority: 3, expectedFields: [], maxRounds: 5 },
  pledged_assets_agent: { priority: 3, expectedFields: [], maxRounds: 5 },
};

export const getAgentPriority = (agent: string): number =>
  AGENT_CATALOG[agent]?.priority ?? DEFAULT_PRIORITY;

export const getExpectedFields = (agent: string): string[] =>
  AGENT_CATALOG[agent]?.expectedFields ?? [];

export const getMaxRounds = (agent: string, fallback: number = DEFAULT_MAX_ROUNDS): number =>
  AGENT_CATALOG[agent]?.maxRounds ?? fallback;
