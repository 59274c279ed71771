import { describe, it, expect } from 'vitest';
import { CrossValidationService } from '../../../src/services/orchestration/CrossValidationService.js';
import { getExpectedFields } from '../../../src/services/orchestration/AgentCatalog.js';
import { DEFAULT_CROSS_CHECKS, type CrossCheck } from '../../../src/services/orchestration/CrossChecks.js';

const service = new CrossValidationService();

const balanceSheet = {
  total_assets: 301339818,
  total_equity: 201801694,
  total_liabilities: 99538124,
  cash_and_bank: 4215770,
};

describe('CrossValidationService.validate', () => {
  it('accepts a balanced balance sheet', () => {
    expect(service.validate('balance_sheet_agent', balanceSheet, getExpectedFields('balance_sheet_agent'))).toEqual({
      isValid: true,
      issues: [],
    });
  });

  it('fails the balance rule when assets drift past the tolerance', () => {
    const result = service.validate(
      'balance_sheet_agent',
      { ...balanceSheet, total_assets: balanceSheet.total_assets + 50000 },
      getExpectedFields('balance_sheet_agent')
    );

    expect(result).toEqual({ isValid: false, issues: ['Failed validation: balance_check'] });
  });

  it('reads Swedish-formatted amounts', () => {
    const formatted = {
      total_assets: '301 339 818',
      total_equity: '201 801 694',
      total_liabilities: '99 538 124 kr',
    };

    expect(service.validate('balance_sheet_agent', formatted, []).isValid).toBe(true);
  });

  it('fails a rule when an operand is unreadable', () => {
    const result = service.validate('balance_sheet_agent', { ...balanceSheet, total_equity: 'okänt' }, []);

    expect(result.issues).toEqual(['Failed validation: balance_check']);
  });

  it('counts missing operands as zero', () => {
    expect(service.validate('balance_sheet_agent', { total_assets: 500 }, []).isValid).toBe(true);
    expect(service.validate('balance_sheet_agent', { total_assets: 5000 }, []).isValid).toBe(false);
  });

  it('reports empty output', () => {
    expect(service.validate('cash_flow_agent', {}, ['closing_cash'])).toEqual({
      isValid: false,
      issues: ['Empty output from cash_flow_agent'],
    });
    expect(service.validate('cash_flow_agent', null, []).issues).toEqual(['Empty output from cash_flow_agent']);
  });

  it('lists missing fields', () => {
    const result = service.validate(
      'governance_agent',
      { chairman: 'Anna Berg', board_members: ['Anna Berg', 'Erik Lund', 'Sara Holm'] },
      getExpectedFields('governance_agent')
    );

    expect(result.issues).toEqual(['Missing fields: [auditor_name, org_number]']);
  });

  it('flags outputs that are mostly empty', () => {
    const result = service.validate(
      'governance_agent',
      { chairman: '', board_members: [], auditor_name: null, org_number: '769600-1234' },
      getExpectedFields('governance_agent')
    );

    expect(result.issues).toEqual([
      'Too many empty fields: [chairman, board_members, auditor_name]',
      'Failed validation: board_members_check',
    ]);
  });

  it('checks the cash flow with a 100 SEK tolerance', () => {
    const base = { opening_cash: 100000, total_cash_flow: 5000 };

    expect(service.validate('cash_flow_agent', { ...base, closing_cash: 105050 }, []).isValid).toBe(true);
    expect(service.validate('cash_flow_agent', { ...base, closing_cash: 105200 }, []).issues).toEqual([
      'Failed validation: cash_flow_check',
    ]);
  });

  it('checks net income against revenues minus costs', () => {
    const base = { total_revenues: 5000000, total_costs: 4200000 };

    expect(service.validate('income_statement_agent', { ...base, net_income: 800500 }, []).isValid).toBe(true);
    expect(service.validate('income_statement_agent', { ...base, net_income: 900000 }, []).isValid).toBe(false);
  });

  it('sums individual loans', () => {
    const loans = [
      { lender: 'SEB', amount: 1000000 },
      { lender: 'Swedbank', amount: '2 500 000' },
    ];

    expect(service.validate('note_loans_agent', { loans, total_loans: 3500000 }, []).isValid).toBe(true);
    expect(service.validate('note_loans_agent', { loans, total_loans: 3600000 }, []).issues).toEqual([
      'Failed validation: loan_total_check',
    ]);
  });

  it('applies no rules to agents without any', () => {
    expect(service.rulesFor('audit_report_agent')).toEqual([]);
    expect(service.validate('audit_report_agent', { opinion: 'clean' }, []).isValid).toBe(true);
  });
});

describe('CrossValidationService.crossValidate', () => {
  it('reports numeric disagreements beyond the tolerance', () => {
    const mismatches = service.crossValidate({
      balance_sheet_agent: { long_term_debt: 1000000 },
      note_loans_agent: { long_term_debt: 1002000 },
    });

    expect(mismatches).toEqual([
      {
        type: 'mismatch',
        agents: ['balance_sheet_agent', 'note_loans_agent'],
        field: 'long_term_debt',
        values: [1000000, 1002000],
        severity: 'warning',
        difference: 2000,
      },
    ]);
  });

  it('accepts numeric values within the tolerance', () => {
    expect(
      service.crossValidate({
        income_statement_agent: { total_revenues: 5000000 },
        note_revenue_agent: { total_revenues: '5 000 800' },
      })
    ).toEqual([]);
  });

  it('requires exact agreement on the property designation', () => {
    const mismatches = service.crossValidate({
      property_agent: { property_designation: 'Eken 1' },
      governance_agent: { property_designation: 'Eken 2' },
    });

    expect(mismatches).toEqual([
      {
        type: 'mismatch',
        agents: ['property_agent', 'governance_agent'],
        field: 'property_designation',
        values: ['Eken 1', 'Eken 2'],
        severity: 'warning',
      },
    ]);
  });

  describe('with every check declared in the opposite agent order', () => {
    const reversed = new CrossValidationService(
      undefined,
      DEFAULT_CROSS_CHECKS.map((check): CrossCheck => ({ ...check, agents: [check.agents[1], check.agents[0]] }))
    );

    it('accepts agreeing pairs either way', () => {
      const results = {
        balance_sheet_agent: { long_term_debt: 1000000 },
        note_loans_agent: { long_term_debt: 1000400 },
        property_agent: { property_designation: 'Eken 1' },
        governance_agent: { property_designation: 'Eken 1' },
      };

      expect(service.crossValidate(results)).toEqual([]);
      expect(reversed.crossValidate(results)).toEqual([]);
    });

    it('flags disagreeing pairs either way with the same difference', () => {
      const results = {
        balance_sheet_agent: { long_term_debt: 1000000 },
        note_loans_agent: { long_term_debt: 1002000 },
        property_agent: { property_designation: 'Eken 1' },
        governance_agent: { property_designation: 'Eken 2' },
      };

      expect(reversed.crossValidate(results)).toEqual([
        {
          type: 'mismatch',
          agents: ['note_loans_agent', 'balance_sheet_agent'],
          field: 'long_term_debt',
          values: [1002000, 1000000],
          severity: 'warning',
          difference: 2000,
        },
        {
          type: 'mismatch',
          agents: ['governance_agent', 'property_agent'],
          field: 'property_designation',
          values: ['Eken 2', 'Eken 1'],
          severity: 'warning',
        },
      ]);
      expect(service.crossValidate(results).map(m => [m.field, m.difference])).toEqual([
        ['long_term_debt', 2000],
        ['property_designation', undefined],
      ]);
    });
  });

  it('skips pairs with a missing or empty agent result', () => {
    expect(service.crossValidate({ balance_sheet_agent: { long_term_debt: 1 } })).toEqual([]);
    expect(service.crossValidate({ balance_sheet_agent: { long_term_debt: 1 }, note_loans_agent: null })).toEqual([]);
  });

  it('ignores numeric checks where one side has no value', () => {
    expect(
      service.crossValidate({
        balance_sheet_agent: { long_term_debt: 1000000 },
        note_loans_agent: { total_loans: 1000000 },
      })
    ).toEqual([]);
  });

  it('reports unreadable numbers without a difference', () => {
    const [mismatch] = service.crossValidate({
      balance_sheet_agent: { long_term_debt: 'se not 12' },
      note_loans_agent: { long_term_debt: 1000000 },
    });

    expect(mismatch).toEqual({
      type: 'mismatch',
      agents: ['balance_sheet_agent', 'note_loans_agent'],
      field: 'long_term_debt',
      values: ['se not 12', 1000000],
      severity: 'warning',
    });
  });
});
