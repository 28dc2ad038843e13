import { describe, expect, it } from 'vitest';
import { RuleBasedCategorizer } from '../src/infrastructure/adapters/categorizer/RuleBasedCategorizer.js';

const context = { accountId: '12345678', institution: 'monzo' };

describe('RuleBasedCategorizer', () => {
  const categorizer = new RuleBasedCategorizer();

  it('labels rows from the rule table, keyed by ledger position', async () => {
    const result = await categorizer.categorize(
      [
        { position: 1, description: 'Costa Coffee', amount: -3.5 },
        { position: 2, description: 'Card payment to TESCO STORES', amount: -46.5 },
        { position: 3, description: 'Salary ACME LTD', amount: 200 },
        { position: 4, description: 'Direct debit COUNCIL TAX', amount: -120 },
      ],
      context,
    );

    expect(result).toEqual({
      1: { position: 1, category: 'Food & Dining', subCategory: 'Coffee Shops', confidence: 0.75 },
      2: { position: 2, category: 'Food & Dining', subCategory: 'Groceries', confidence: 0.75 },
      3: { position: 3, category: 'Income', subCategory: 'Salary', confidence: 0.75 },
      4: { position: 4, category: 'Bills & Utilities', subCategory: 'Council Tax', confidence: 0.75 },
    });
  });

  it('falls back on the direction of the money when no rule matches', async () => {
    const result = await categorizer.categorize(
      [
        { position: 1, description: 'ZX Widgets', amount: -5 },
        { position: 2, description: 'ZX Widgets', amount: 5 },
      ],
      context,
    );

    expect(result[1]).toEqual({ position: 1, category: 'Other', subCategory: 'General', confidence: 0.3 });
    expect(result[2]).toEqual({ position: 2, category: 'Income', subCategory: 'Other Income', confidence: 0.3 });
  });
});
