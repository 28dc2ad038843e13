import { ExtractionError, UnsupportedDocumentError } from '../../domain/errors/PipelineError.js';
import { RawExtractionDTO, RawExtractionSchema } from '../dto/RawExtractionDTO.js';
import { StatementDocumentDTO } from '../dto/StatementDocumentDTO.js';
import { StatementExtractorPort } from '../ports/StatementExtractorPort.js';
import { logger } from '../../infrastructure/logging/Logger.js';

export interface RegisteredExtractor {
  id: string;
  institutionName: string;
  version: string;
  priority: number;
}

export interface ExtractionOutcome {
  extractor: StatementExtractorPort;
  extraction: RawExtractionDTO;
}

/**
 * Ordered dispatch table of statement extractors. Registration order is the
 * priority order; the first applicable extractor wins and there is no partial
 * or fuzzy fallback.
 */
export class ExtractorRegistry {
  private readonly extractors: StatementExtractorPort[] = [];

  constructor(extractors: readonly StatementExtractorPort[] = []) {
    extractors.forEach((extractor) => this.register(extractor));
  }

  register(extractor: StatementExtractorPort): void {
    if (this.extractors.some((existing) => existing.id === extractor.id)) {
      throw new Error(`Extractor "${extractor.id}" is already registered`);
    }

    this.extractors.push(extractor);

    logger.debug('Registered extractor', {
      extractor_id: extractor.id,
      institution: extractor.institutionName,
      version: extractor.version(),
      priority: this.extractors.length - 1,
    });
  }

  list(): RegisteredExtractor[] {
    return this.extractors.map((extractor, priority) => ({
      id: extractor.id,
      institutionName: extractor.institutionName,
      version: extractor.version(),
      priority,
    }));
  }

  /**
   * @param institutionHint - restricts the candidates to the extractor with this id
   * @throws UnsupportedDocumentError when no candidate claims the document
   */
  select(document: StatementDocumentDTO, institutionHint?: string): StatementExtractorPort {
    const hint = institutionHint?.trim().toLowerCase();
    const candidates = hint ? this.extractors.filter((extractor) => extractor.id === hint) : this.extractors;

    const selected = candidates.find((extractor) => extractor.applicable(document));
    if (!selected) {
      throw new UnsupportedDocumentError(document.documentId, hint);
    }

    return selected;
  }

  extract(document: StatementDocumentDTO, institutionHint?: string): ExtractionOutcome {
    const extractor = this.select(document, institutionHint);

    let output: unknown;
    try {
      output = extractor.extract(document);
    } catch (error) {
      throw new ExtractionError(
        document.documentId,
        extractor.id,
        error instanceof Error ? error.message : String(error),
      );
    }

    const parsed = RawExtractionSchema.safeParse(output);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ExtractionError(
        document.documentId,
        extractor.id,
        `output does not match the raw row contract at ${issue.path.join('.') || '(root)'}: ${issue.message}`,
      );
    }

    logger.debug('Extracted document', {
      document_id: document.documentId,
      extractor_id: extractor.id,
      extractor_version: extractor.version(),
      row_count: parsed.data.rows.length,
    });

    return { extractor, extraction: parsed.data };
  }
}
