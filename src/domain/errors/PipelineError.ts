export type PipelineErrorCode =
  | 'UNSUPPORTED_DOCUMENT'
  | 'EXTRACTION_FAILED'
  | 'MALFORMED_ROW'
  | 'MALFORMED_PERIOD'
  | 'RECONCILIATION_INPUT'
  | 'LEDGER_INTEGRITY';

/**
 * Structural failures raised to the caller of the pipeline. Continuity
 * findings (gaps, mismatches, duplicates) are never thrown; they live in the
 * ContinuityReport.
 */
export class PipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnsupportedDocumentError extends PipelineError {
  constructor(documentId: string, institutionHint?: string) {
    super(
      'UNSUPPORTED_DOCUMENT',
      institutionHint
        ? `No extractor for institution "${institutionHint}" accepts document ${documentId}`
        : `No registered extractor accepts document ${documentId}`,
      { documentId, institutionHint },
    );
  }
}

export class ExtractionError extends PipelineError {
  constructor(documentId: string, extractorId: string, reason: string) {
    super('EXTRACTION_FAILED', `Extractor ${extractorId} failed on document ${documentId}: ${reason}`, {
      documentId,
      extractorId,
      reason,
    });
  }
}

export class MalformedRowError extends PipelineError {
  constructor(
    readonly documentId: string,
    readonly rowIndex: number,
    readonly field: string,
    readonly reason: string,
  ) {
    super('MALFORMED_ROW', `Row ${rowIndex} of document ${documentId} has an invalid ${field}: ${reason}`, {
      documentId,
      rowIndex,
      field,
      reason,
    });
  }
}

export class MalformedPeriodError extends PipelineError {
  constructor(
    readonly documentId: string,
    readonly field: string,
    readonly reason: string,
  ) {
    super('MALFORMED_PERIOD', `Statement metadata of document ${documentId} has an invalid ${field}: ${reason}`, {
      documentId,
      field,
      reason,
    });
  }
}

export class ReconciliationInputError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('RECONCILIATION_INPUT', message, details);
  }
}

export class LedgerIntegrityError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('LEDGER_INTEGRITY', message, details);
  }
}

export const isPipelineError = (error: unknown): error is PipelineError => error instanceof PipelineError;
