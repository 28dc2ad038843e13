export interface CanonicalTransaction {
  readonly accountId: string;
  readonly date: string; // ISO date, no time component
  readonly description: string; // as extracted, never rewritten
  readonly transactionType: string | null;
  readonly amount: number; // debit negative, credit positive
  readonly runningBalance: number | null;
  readonly sourcePeriodId: string;
  readonly sequenceIndex: number;
}

export interface TransactionRef {
  periodId: string;
  sequenceIndex: number;
  date: string;
  amount: number;
  description: string;
}

export const toTransactionRef = (txn: CanonicalTransaction): TransactionRef => ({
  periodId: txn.sourcePeriodId,
  sequenceIndex: txn.sequenceIndex,
  date: txn.date,
  amount: txn.amount,
  description: txn.description,
});
