import { StatementPeriod } from '../../domain/entities/StatementPeriod.js';

export interface AccountKey {
  institution: string;
  accountId: string;
}

export interface StoragePort {
  savePeriod(period: StatementPeriod): Promise<void>;
  loadPeriod(periodId: string): Promise<StatementPeriod | null>;
  listPeriods(account: AccountKey): Promise<StatementPeriod[]>;
  listAccounts(): Promise<Array<AccountKey & { periodCount: number }>>;
  deletePeriod(periodId: string): Promise<boolean>;
}
