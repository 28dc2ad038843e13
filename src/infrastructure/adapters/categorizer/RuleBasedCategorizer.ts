import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { CategorizedTransactionDTO } from '../../../application/dto/CategorizedTransactionDTO.js';
import { CategorizerPort } from '../../../application/ports/CategorizerPort.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_RULES_PATH = path.resolve(__dirname, '../../../../data/category-rules.json');

const RuleFileSchema = z.array(
  z.object({
    pattern: z.string().min(1),
    category: z.string().min(1),
    subCategory: z.string().optional(),
  }),
);

interface Rule {
  test: (input: string) => boolean;
  category: string;
  subCategory?: string;
}

export const loadCategoryRules = (rulesPath: string = DEFAULT_RULES_PATH): Rule[] =>
  RuleFileSchema.parse(JSON.parse(fs.readFileSync(rulesPath, 'utf8'))).map((entry) => {
    const expression = new RegExp(entry.pattern, 'i');
    return {
      test: (desc: string) => expression.test(desc),
      category: entry.category,
      subCategory: entry.subCategory,
    };
  });

/**
 * Labels ledger rows from a static rule table. Runs after reconciliation and
 * only ever reads description and amount.
 */
export class RuleBasedCategorizer implements CategorizerPort {
  private readonly rules: Rule[];

  constructor(rulesPath?: string) {
    this.rules = loadCategoryRules(rulesPath);
  }

  async categorize(
    transactions: ReadonlyArray<{ position: number; description: string; amount: number }>,
    _context: { accountId: string; institution: string },
  ): Promise<Record<number, CategorizedTransactionDTO>> {
    const categorized: Record<number, CategorizedTransactionDTO> = {};

    for (const txn of transactions) {
      const rule = this.rules.find((candidate) => candidate.test(txn.description));

      if (rule) {
        categorized[txn.position] = {
          position: txn.position,
          category: rule.category,
          subCategory: rule.subCategory,
          confidence: 0.75,
        };
      } else {
        categorized[txn.position] = {
          position: txn.position,
          category: txn.amount > 0 ? 'Income' : 'Other',
          subCategory: txn.amount > 0 ? 'Other Income' : 'General',
          confidence: 0.3,
        };
      }
    }

    return categorized;
  }
}
