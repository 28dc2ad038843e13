import { CanonicalTransaction } from './CanonicalTransaction.js';

export interface StatementPeriod {
  readonly periodId: string;
  readonly accountId: string;
  readonly institution: string;
  readonly sourceDocumentId: string;
  readonly startDate: string | null; // ISO date
  readonly endDate: string | null; // ISO date
  readonly openingBalance: number | null;
  readonly closingBalance: number | null;
  readonly holderName: string | null;
  readonly extractorVersion: string;
  readonly fingerprint: string | null;
  readonly transactions: readonly CanonicalTransaction[];
}
