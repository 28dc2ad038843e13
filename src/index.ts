export type { CanonicalTransaction, TransactionRef } from './domain/entities/CanonicalTransaction.js';
export type { StatementPeriod } from './domain/entities/StatementPeriod.js';
export type { Ledger } from './domain/entities/Ledger.js';
export type {
  BalanceMismatch,
  ContinuityReport,
  ContinuityStatus,
  DateRange,
  DuplicateCandidate,
  Gap,
  LinkStatus,
  Overlap,
  PeriodLink,
  PeriodSummary,
  RunningBalanceBreak,
  StatementTotalsCheck,
  UncheckedReason,
} from './domain/entities/ContinuityReport.js';
export {
  ExtractionError,
  LedgerIntegrityError,
  MalformedPeriodError,
  MalformedRowError,
  PipelineError,
  ReconciliationInputError,
  UnsupportedDocumentError,
  isPipelineError,
} from './domain/errors/PipelineError.js';
export type { PipelineErrorCode } from './domain/errors/PipelineError.js';
export { formatMoney, parseMoney } from './domain/services/Money.js';
export { parseStatementDate } from './domain/services/StatementDate.js';

export { StatementDocumentSchema } from './application/dto/StatementDocumentDTO.js';
export type { StatementDocumentDTO } from './application/dto/StatementDocumentDTO.js';
export { RawExtractionSchema, RawPeriodMetadataSchema, RawStatementRowSchema } from './application/dto/RawExtractionDTO.js';
export type { RawExtractionDTO, RawPeriodMetadataDTO, RawStatementRowDTO } from './application/dto/RawExtractionDTO.js';
export { ExportedLedgerSchema } from './application/dto/ExportedLedgerDTO.js';
export type { ExportedLedgerDTO, ExportedPeriodDTO, ExportedRowDTO } from './application/dto/ExportedLedgerDTO.js';
export type { CategorizedTransactionDTO } from './application/dto/CategorizedTransactionDTO.js';
export type { StatementExtractorPort } from './application/ports/StatementExtractorPort.js';
export type { CategorizerPort } from './application/ports/CategorizerPort.js';
export type { LedgerExporterPort } from './application/ports/LedgerExporterPort.js';
export type { AccountKey, StoragePort } from './application/ports/StoragePort.js';

export { ExtractorRegistry } from './application/services/ExtractorRegistry.js';
export type { RegisteredExtractor } from './application/services/ExtractorRegistry.js';
export { NormalizationService } from './application/services/NormalizationService.js';
export { ContinuityEngine } from './application/services/ContinuityEngine.js';
export type { ContinuityEngineOptions } from './application/services/ContinuityEngine.js';
export { LedgerAssembler, describeIssues } from './application/services/LedgerAssembler.js';
export type { AssembledLedger, LedgerRow } from './application/services/LedgerAssembler.js';
export { ReconciliationService } from './application/services/ReconciliationService.js';
export type { DocumentFailure, ReconciliationRunResult } from './application/services/ReconciliationService.js';

export { MonzoStatementExtractor } from './infrastructure/adapters/extractors/MonzoStatementExtractor.js';
export { NationwideStatementExtractor } from './infrastructure/adapters/extractors/NationwideStatementExtractor.js';
export { RuleBasedCategorizer } from './infrastructure/adapters/categorizer/RuleBasedCategorizer.js';
export { JsonLedgerExporter } from './infrastructure/adapters/export/JsonLedgerExporter.js';
export { InMemoryStorageAdapter } from './infrastructure/adapters/storage/InMemoryStorageAdapter.js';
export { AppContainer, defaultExtractors } from './infrastructure/bootstrap/AppContainer.js';
export { loadConfig } from './infrastructure/config/Config.js';
export type { AppConfig } from './infrastructure/config/Config.js';
export { createApp } from './app.js';
