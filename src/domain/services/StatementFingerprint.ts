import crypto from 'node:crypto';
import { normalizeDescription } from './DescriptionNormalizer.js';

export interface FingerprintRow {
  date: string;
  transactionType: string | null;
  description: string;
  amount: number;
  runningBalance: number | null;
}

/**
 * Order-independent hash of a statement's rows. Two documents carrying the same
 * statement hash equal even when their extractors emit rows in another order.
 */
export const buildStatementFingerprint = (rows: readonly FingerprintRow[]): string | null => {
  if (rows.length === 0) {
    return null;
  }

  const serialized = rows
    .map((row) =>
      [
        row.date,
        normalizeDescription(row.transactionType ?? ''),
        normalizeDescription(row.description),
        row.amount.toFixed(2),
        row.runningBalance === null ? '' : row.runningBalance.toFixed(2),
      ].join('|'),
    )
    .sort();

  return crypto.createHash('sha256').update(serialized.join('\n')).digest('hex');
};
