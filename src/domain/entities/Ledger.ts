import { CanonicalTransaction } from './CanonicalTransaction.js';
import { ContinuityReport } from './ContinuityReport.js';
import { StatementPeriod } from './StatementPeriod.js';

export interface Ledger {
  readonly accountId: string;
  readonly institution: string;
  readonly holderName: string | null;
  readonly periods: readonly StatementPeriod[]; // chronological, unorderable last
  readonly transactions: readonly CanonicalTransaction[];
  readonly report: ContinuityReport;
}
