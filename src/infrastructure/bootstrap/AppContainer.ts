import { CategorizerPort } from '../../application/ports/CategorizerPort.js';
import { LedgerExporterPort } from '../../application/ports/LedgerExporterPort.js';
import { StatementExtractorPort } from '../../application/ports/StatementExtractorPort.js';
import { StoragePort } from '../../application/ports/StoragePort.js';
import { ContinuityEngine } from '../../application/services/ContinuityEngine.js';
import { ExtractorRegistry } from '../../application/services/ExtractorRegistry.js';
import { LedgerAssembler } from '../../application/services/LedgerAssembler.js';
import { NormalizationService } from '../../application/services/NormalizationService.js';
import { ReconciliationService } from '../../application/services/ReconciliationService.js';
import { RuleBasedCategorizer } from '../adapters/categorizer/RuleBasedCategorizer.js';
import { JsonLedgerExporter } from '../adapters/export/JsonLedgerExporter.js';
import { MonzoStatementExtractor } from '../adapters/extractors/MonzoStatementExtractor.js';
import { NationwideStatementExtractor } from '../adapters/extractors/NationwideStatementExtractor.js';
import { InMemoryStorageAdapter } from '../adapters/storage/InMemoryStorageAdapter.js';
import { AppConfig, loadConfig } from '../config/Config.js';
import { setLogLevel } from '../logging/Logger.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  /** Replaces the built-in extractors; order is priority order. */
  extractors?: StatementExtractorPort[];
  storage?: StoragePort;
  categorizer?: CategorizerPort;
  exporter?: LedgerExporterPort;
}

/** Fixed priority order of the built-in institution extractors. */
export const defaultExtractors = (): StatementExtractorPort[] => [
  new MonzoStatementExtractor(),
  new NationwideStatementExtractor(),
];

export class AppContainer {
  readonly config: AppConfig;

  readonly registry: ExtractorRegistry;
  readonly normalizer: NormalizationService;
  readonly engine: ContinuityEngine;
  readonly assembler: LedgerAssembler;
  readonly storage: StoragePort;
  readonly categorizer: CategorizerPort;
  readonly exporter: LedgerExporterPort;
  readonly reconciliationService: ReconciliationService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    setLogLevel(this.config.logging.level);

    this.registry = new ExtractorRegistry(overrides.extractors ?? defaultExtractors());
    this.normalizer = new NormalizationService();
    this.engine = new ContinuityEngine({
      balanceToleranceMinorUnits: this.config.reconciliation.balanceToleranceMinorUnits,
    });
    this.assembler = new LedgerAssembler();
    this.storage = overrides.storage ?? new InMemoryStorageAdapter();
    this.categorizer = overrides.categorizer ?? new RuleBasedCategorizer();
    this.exporter = overrides.exporter ?? new JsonLedgerExporter();

    this.reconciliationService = new ReconciliationService(
      this.registry,
      this.normalizer,
      this.engine,
      this.assembler,
      this.categorizer,
      this.exporter,
      this.storage,
    );
  }
}
