/* =============================================================================
 * ANALYSIS ERRORS
 * ============================================================================= */

/** Error codes */
export const AnalysisErrorCode = {
  INVALID_ARGUMENT: "ANALYSIS_INVALID_ARGUMENT",
  MALFORMED_SPECIALIZATION_TARGET: "ANALYSIS_MALFORMED_SPECIALIZATION_TARGET",
  UNCLASSIFIABLE_HOST_OBJECT: "ANALYSIS_UNCLASSIFIABLE_HOST_OBJECT",
  REENTRANT_ANALYSIS: "ANALYSIS_REENTRANT",
  INVALID_STUB_DATABASE: "ANALYSIS_INVALID_STUB_DATABASE",
} as const;

export type AnalysisErrorCodeType = (typeof AnalysisErrorCode)[keyof typeof AnalysisErrorCode];

/**
 * Caller contract violations and host contract breaches.
 *
 * Unresolved imports and missing members are not errors; they produce empty sets.
 */
export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: AnalysisErrorCodeType,
    public readonly detail?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "AnalysisError";
  }
}

export function invalidArgument(argument: string, message: string): AnalysisError {
  return new AnalysisError(`${argument}: ${message}`, AnalysisErrorCode.INVALID_ARGUMENT, { argument });
}

export function isAnalysisError(value: unknown, code?: AnalysisErrorCodeType): value is AnalysisError {
  return value instanceof AnalysisError && (code === undefined || value.code === code);
}
