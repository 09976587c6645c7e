//error taxonomy for the verification pipeline
//line-level errors are caught by the orchestrator, invoice-level ones abort that invoice

export type TaxVerificationErrorCode =
  | 'MALFORMED_EXTRACTION'
  | 'ADVISORY_PARSE'
  | 'ADVISORY_SERVICE'
  | 'CONFIGURATION';

export class TaxVerificationError extends Error {
  constructor(
    readonly code: TaxVerificationErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

//a required field of the extraction document is absent; no determination is produced
export class MalformedExtractionError extends TaxVerificationError {
  constructor(readonly field: string, detail?: string) {
    super('MALFORMED_EXTRACTION', `Extraction document is missing required field "${field}"${detail ? `: ${detail}` : ''}`);
  }
}

//advisory reply could not be turned into a verdict; retrying will not help
export class AdvisoryParseError extends TaxVerificationError {
  constructor(message: string, readonly rawReply: string, options?: { cause?: unknown }) {
    super('ADVISORY_PARSE', message, options);
  }
}

export class AdvisoryServiceError extends TaxVerificationError {
  constructor(
    message: string,
    readonly retryable: boolean,
    readonly attempts = 1,
    options?: { cause?: unknown },
  ) {
    super('ADVISORY_SERVICE', message, options);
  }
}

//no knowledge base mapped for the jurisdiction; will not resolve on retry
export class ConfigurationError extends TaxVerificationError {
  constructor(message: string, readonly jurisdiction?: string) {
    super('CONFIGURATION', message);
  }
}
