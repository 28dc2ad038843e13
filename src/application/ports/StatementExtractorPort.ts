import { RawExtractionDTO } from '../dto/RawExtractionDTO.js';
import { StatementDocumentDTO } from '../dto/StatementDocumentDTO.js';

/**
 * One institution's statement layout. Implementations must be pure: the same
 * document always yields the same rows and metadata, and malformed input
 * throws instead of yielding an empty extraction.
 */
export interface StatementExtractorPort {
  /** Stable identifier, also used as the institution key for grouping ledgers. */
  readonly id: string;
  readonly institutionName: string;

  applicable(document: StatementDocumentDTO): boolean;

  extract(document: StatementDocumentDTO): RawExtractionDTO;

  /** Compatibility tag recorded on every period this extractor produces. */
  version(): string;
}
