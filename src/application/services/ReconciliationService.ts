import crypto from 'node:crypto';
import { StatementPeriod } from '../../domain/entities/StatementPeriod.js';
import { isPipelineError, PipelineErrorCode } from '../../domain/errors/PipelineError.js';
import { ExportedLedgerDTO } from '../dto/ExportedLedgerDTO.js';
import { StatementDocumentDTO } from '../dto/StatementDocumentDTO.js';
import { CategorizerPort } from '../ports/CategorizerPort.js';
import { LedgerExporterPort } from '../ports/LedgerExporterPort.js';
import { AccountKey, StoragePort } from '../ports/StoragePort.js';
import { ContinuityEngine } from './ContinuityEngine.js';
import { ExtractorRegistry } from './ExtractorRegistry.js';
import { LedgerAssembler } from './LedgerAssembler.js';
import { NormalizationService } from './NormalizationService.js';
import { logger } from '../../infrastructure/logging/Logger.js';

export interface DocumentFailure {
  documentId: string;
  code: PipelineErrorCode;
  message: string;
  details: Record<string, unknown>;
}

export interface ReconciliationRunResult {
  runId: string;
  ledgers: ExportedLedgerDTO[];
  failures: DocumentFailure[];
  /** true only when every document was read and every ledger is continuous */
  succeeded: boolean;
}

export interface ReconcileOptions {
  institutionHint?: string;
}

export class ReconciliationService {
  constructor(
    private readonly registry: ExtractorRegistry,
    private readonly normalizer: NormalizationService,
    private readonly engine: ContinuityEngine,
    private readonly assembler: LedgerAssembler,
    private readonly categorizer: CategorizerPort,
    private readonly exporter: LedgerExporterPort,
    private readonly storage: StoragePort,
  ) {}

  /**
   * Extracts and normalizes a single document.
   *
   * @throws UnsupportedDocumentError, ExtractionError, MalformedRowError or MalformedPeriodError
   */
  ingestDocument(document: StatementDocumentDTO, institutionHint?: string): StatementPeriod {
    const { extractor, extraction } = this.registry.extract(document, institutionHint);

    const { period } = this.normalizer.normalize(extraction.rows, extraction.period, extractor.version(), {
      documentId: document.documentId,
      institution: extractor.id,
    });

    return period;
  }

  /** Ingests a document and keeps its period for later reconciliation of the account. */
  async ingestAndStore(document: StatementDocumentDTO, institutionHint?: string): Promise<StatementPeriod> {
    const period = this.ingestDocument(document, institutionHint);
    await this.storage.savePeriod(period);

    logger.info('Stored statement period', {
      document_id: document.documentId,
      period_id: period.periodId,
      institution: period.institution,
      account_id: period.accountId,
      transaction_count: period.transactions.length,
    });

    return period;
  }

  /**
   * Runs the whole pipeline over a batch of documents. A document that cannot
   * be read is reported in `failures` and does not stop its siblings; every
   * account found is reconciled on its own.
   */
  async reconcileDocuments(
    documents: readonly StatementDocumentDTO[],
    options: ReconcileOptions = {},
  ): Promise<ReconciliationRunResult> {
    const runId = crypto.randomUUID();
    const failures: DocumentFailure[] = [];
    const periods: StatementPeriod[] = [];

    logger.info('Reconciliation run started', { run_id: runId, document_count: documents.length });

    const seen = new Set<string>();

    for (const document of documents) {
      if (seen.has(document.documentId)) {
        failures.push({
          documentId: document.documentId,
          code: 'RECONCILIATION_INPUT',
          message: `Document ${document.documentId} was supplied more than once in this run`,
          details: { documentId: document.documentId },
        });
        continue;
      }
      seen.add(document.documentId);

      try {
        periods.push(this.ingestDocument(document, options.institutionHint));
      } catch (error) {
        if (!isPipelineError(error)) {
          throw error;
        }
        logger.warn('Document rejected', {
          run_id: runId,
          document_id: document.documentId,
          code: error.code,
          reason: error.message,
        });
        failures.push({
          documentId: document.documentId,
          code: error.code,
          message: error.message,
          details: error.details,
        });
      }
    }

    const ledgers: ExportedLedgerDTO[] = [];
    for (const group of groupByAccount(periods)) {
      ledgers.push(await this.reconcilePeriods(group));
    }

    const succeeded = failures.length === 0 && ledgers.length > 0 && ledgers.every((ledger) => ledger.succeeded);

    logger.info('Reconciliation run finished', {
      run_id: runId,
      ledger_count: ledgers.length,
      failure_count: failures.length,
      statuses: ledgers.map((ledger) => `${ledger.institution}/${ledger.accountId}:${ledger.status}`),
      succeeded,
    });

    return { runId, ledgers, failures, succeeded };
  }

  /** Reconciles every stored period of one account. Returns null when none are stored. */
  async reconcileStoredAccount(account: AccountKey): Promise<ExportedLedgerDTO | null> {
    const periods = await this.storage.listPeriods(account);
    if (periods.length === 0) {
      return null;
    }
    return this.reconcilePeriods(periods);
  }

  async reconcilePeriods(periods: readonly StatementPeriod[]): Promise<ExportedLedgerDTO> {
    const ledger = this.engine.reconcile(periods);
    const assembled = this.assembler.assemble(ledger);

    const categories = await this.categorizer.categorize(
      assembled.rows.map((row) => ({ position: row.position, description: row.description, amount: row.amount })),
      { accountId: assembled.accountId, institution: assembled.institution },
    );

    if (!assembled.succeeded) {
      logger.warn('Ledger is not continuous', {
        institution: assembled.institution,
        account_id: assembled.accountId,
        status: assembled.status,
        issue_count: assembled.issues.length,
      });
    }

    return this.exporter.export(assembled, categories);
  }
}

const groupByAccount = (periods: readonly StatementPeriod[]): StatementPeriod[][] => {
  const groups = new Map<string, StatementPeriod[]>();
  for (const period of periods) {
    const key = JSON.stringify([period.institution, period.accountId]);
    groups.set(key, [...(groups.get(key) ?? []), period]);
  }

  return Array.from(groups.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, group]) => group);
};
