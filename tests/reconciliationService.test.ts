import { beforeEach, describe, expect, it } from 'vitest';
import { UnsupportedDocumentError } from '../src/domain/errors/PipelineError.js';
import { AppContainer } from '../src/infrastructure/bootstrap/AppContainer.js';
import { loadConfig } from '../src/infrastructure/config/Config.js';
import { monzoFebruary, monzoJanuary, nationwideFebruary, unreadableDocument } from './helpers/statements.js';

const monzoAccount = { institution: 'monzo', accountId: '12345678' };

describe('ReconciliationService', () => {
  let container: AppContainer;

  beforeEach(() => {
    container = new AppContainer({ config: loadConfig({ LOG_LEVEL: 'error' }) });
  });

  it('reconciles each account separately and reports unreadable documents without stopping', async () => {
    const result = await container.reconciliationService.reconcileDocuments([
      monzoJanuary(),
      unreadableDocument(),
      monzoFebruary(),
      nationwideFebruary(),
    ]);

    expect(result.failures).toEqual([
      {
        documentId: 'letter',
        code: 'UNSUPPORTED_DOCUMENT',
        message: 'No registered extractor accepts document letter',
        details: { documentId: 'letter', institutionHint: undefined },
      },
    ]);
    expect(result.ledgers.map((ledger) => [ledger.institution, ledger.accountId, ledger.status])).toEqual([
      ['monzo', '12345678', 'continuous'],
      ['nationwide', '87654321', 'continuous'],
    ]);
    expect(result.succeeded).toBe(false);
    expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('succeeds only when every document was read and every ledger is continuous', async () => {
    const result = await container.reconciliationService.reconcileDocuments([monzoFebruary(), monzoJanuary()]);

    expect(result.failures).toEqual([]);
    expect(result.succeeded).toBe(true);

    const [ledger] = result.ledgers;
    expect(ledger.headline).toBe('Continuity verified');
    expect(ledger.periods.map((period) => [period.documentId, period.startDate, period.totalsStatus])).toEqual([
      ['monzo-jan', '2024-01-01', 'ok'],
      ['monzo-feb', '2024-02-01', 'ok'],
    ]);
    expect(ledger.rows.map((row) => [row.position, row.date, row.amount, row.category])).toEqual([
      [1, '2024-01-03', -3.5, 'Food & Dining'],
      [2, '2024-01-10', -46.5, 'Food & Dining'],
      [3, '2024-01-15', 200, 'Income'],
      [4, '2024-02-10', -50, 'Bills & Utilities'],
    ]);
  });

  it('is not successful when a month is missing', async () => {
    const january = monzoJanuary();
    const march = monzoFebruary();
    march.documentId = 'monzo-mar';
    march.pages[0] = march.pages[0]
      .replace('01/02/2024 - 29/02/2024', '01/03/2024 - 31/03/2024')
      .replace('10/02/2024', '10/03/2024');

    const result = await container.reconciliationService.reconcileDocuments([january, march]);

    expect(result.succeeded).toBe(false);
    expect(result.ledgers[0].status).toBe('gaps_detected');
    expect(result.ledgers[0].issues).toEqual([
      'Missing statement coverage from 2024-02-01 to 2024-02-29 (between period:monzo-jan and period:monzo-mar)',
    ]);
  });

  it('reports a document supplied twice in one run', async () => {
    const result = await container.reconciliationService.reconcileDocuments([monzoJanuary(), monzoJanuary()]);

    expect(result.failures).toEqual([
      {
        documentId: 'monzo-jan',
        code: 'RECONCILIATION_INPUT',
        message: 'Document monzo-jan was supplied more than once in this run',
        details: { documentId: 'monzo-jan' },
      },
    ]);
    expect(result.ledgers).toHaveLength(1);
  });

  it('honours an institution hint', async () => {
    const result = await container.reconciliationService.reconcileDocuments([monzoJanuary()], {
      institutionHint: 'nationwide',
    });

    expect(result.ledgers).toEqual([]);
    expect(result.failures[0].message).toBe('No extractor for institution "nationwide" accepts document monzo-jan');
    expect(result.succeeded).toBe(false);
  });

  it('raises structural errors from single-document ingestion', () => {
    expect(() => container.reconciliationService.ingestDocument(unreadableDocument())).toThrow(UnsupportedDocumentError);
  });

  describe('stored periods', () => {
    it('reconciles an account from statements ingested one at a time', async () => {
      const service = container.reconciliationService;
      await service.ingestAndStore(monzoFebruary());
      await service.ingestAndStore(monzoJanuary());

      expect(await container.storage.listAccounts()).toEqual([{ ...monzoAccount, periodCount: 2 }]);

      const ledger = await service.reconcileStoredAccount(monzoAccount);
      expect(ledger?.status).toBe('continuous');
      expect(ledger?.rows).toHaveLength(4);
    });

    it('replaces a period when the same document is ingested again', async () => {
      const service = container.reconciliationService;
      await service.ingestAndStore(monzoJanuary());
      await service.ingestAndStore(monzoJanuary());

      expect(await container.storage.listPeriods(monzoAccount)).toHaveLength(1);
    });

    it('returns null for an account with nothing stored', async () => {
      expect(await container.reconciliationService.reconcileStoredAccount(monzoAccount)).toBeNull();
    });

    it('forgets a deleted period', async () => {
      const service = container.reconciliationService;
      await service.ingestAndStore(monzoJanuary());
      await service.ingestAndStore(monzoFebruary());

      expect(await container.storage.deletePeriod('period:monzo-feb')).toBe(true);
      expect(await container.storage.deletePeriod('period:monzo-feb')).toBe(false);

      const ledger = await service.reconcileStoredAccount(monzoAccount);
      expect(ledger?.periods.map((period) => period.periodId)).toEqual(['period:monzo-jan']);
    });
  });
});
