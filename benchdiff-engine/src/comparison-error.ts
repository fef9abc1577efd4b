/**
 * Comparison Error Handling
 *
 * Structured error for the fatal conditions of a comparison run. Per-cell
 * problems (missing value, unparsable number, zero baseline) never raise;
 * they surface as an undefined delta instead.
 *
 * @module comparison-error
 */

/**
 * Error codes for fatal comparison errors
 */
export enum ComparisonErrorCode {
  /** No column shared by both datasets can identify a benchmark case */
  UNRESOLVABLE_KEY = 'UNRESOLVABLE_KEY',
  /** No metric column is shared by both datasets */
  NO_COMPARABLE_METRICS = 'NO_COMPARABLE_METRICS',
}

/**
 * Error code to guidance mapping
 */
const ERROR_GUIDANCE: Record<ComparisonErrorCode, string> = {
  [ComparisonErrorCode.UNRESOLVABLE_KEY]:
    'Specify --key with column names present in both files.',
  [ComparisonErrorCode.NO_COMPARABLE_METRICS]:
    'Use --metrics to specify columns to compare.',
};

/**
 * Structured comparison error details
 */
export interface ComparisonErrorInfo {
  code: ComparisonErrorCode;
  message: string;
  /** Actionable guidance naming the override option */
  guidance: string;
  details?: Record<string, unknown>;
}

/**
 * Fatal error raised before any comparison output is produced
 */
export class ComparisonError extends Error {
  public readonly info: ComparisonErrorInfo;

  constructor(info: Omit<ComparisonErrorInfo, 'guidance'> & { guidance?: string }) {
    super(info.message);
    this.name = 'ComparisonError';
    this.info = {
      code: info.code,
      message: info.message,
      guidance: info.guidance ?? ERROR_GUIDANCE[info.code],
      details: info.details,
    };
  }

  get code(): ComparisonErrorCode {
    return this.info.code;
  }

  /**
   * Message followed by guidance, for terminal output
   */
  describe(): string {
    return `${this.info.message} ${this.info.guidance}`;
  }

  /**
   * Get a JSON-serializable representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.info.code,
      message: this.info.message,
      guidance: this.info.guidance,
      details: this.info.details,
    };
  }
}

/**
 * Type guard for ComparisonError
 */
export function isComparisonError(error: unknown): error is ComparisonError {
  return error instanceof ComparisonError;
}
