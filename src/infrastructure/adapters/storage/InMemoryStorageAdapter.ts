import { StatementPeriod } from '../../../domain/entities/StatementPeriod.js';
import { AccountKey, StoragePort } from '../../../application/ports/StoragePort.js';

const accountKey = (account: AccountKey): string => JSON.stringify([account.institution, account.accountId]);

export class InMemoryStorageAdapter implements StoragePort {
  private readonly periods = new Map<string, StatementPeriod>();

  async savePeriod(period: StatementPeriod): Promise<void> {
    // Periods are immutable; re-ingesting a document replaces its period wholesale.
    this.periods.set(period.periodId, period);
  }

  async loadPeriod(periodId: string): Promise<StatementPeriod | null> {
    return this.periods.get(periodId) ?? null;
  }

  async listPeriods(account: AccountKey): Promise<StatementPeriod[]> {
    const key = accountKey(account);
    return Array.from(this.periods.values())
      .filter((period) => accountKey(period) === key)
      .sort((a, b) => (a.periodId < b.periodId ? -1 : 1));
  }

  async listAccounts(): Promise<Array<AccountKey & { periodCount: number }>> {
    const counts = new Map<string, AccountKey & { periodCount: number }>();

    for (const period of this.periods.values()) {
      const key = accountKey(period);
      const entry = counts.get(key) ?? { institution: period.institution, accountId: period.accountId, periodCount: 0 };
      entry.periodCount += 1;
      counts.set(key, entry);
    }

    return Array.from(counts.values()).sort(
      (a, b) => a.institution.localeCompare(b.institution) || a.accountId.localeCompare(b.accountId),
    );
  }

  async deletePeriod(periodId: string): Promise<boolean> {
    return this.periods.delete(periodId);
  }
}
