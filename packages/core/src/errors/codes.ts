/**
 * Error codes for all relgate-specific errors.
 * Used to identify error types programmatically.
 */
export enum RelgateErrorCode {
  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Input
  EMPTY_BATCH = 'EMPTY_BATCH',

  // Analysis
  FILE_ANALYSIS_FAILED = 'FILE_ANALYSIS_FAILED',
  STAGE_FAILED = 'STAGE_FAILED',
}
