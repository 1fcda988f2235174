/** Error categories for the provisioner */
export const ErrorCode = {
  // Configuration errors
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_PARSE_ERROR: 'CONFIG_PARSE_ERROR',
  CONFIG_VALIDATION_ERROR: 'CONFIG_VALIDATION_ERROR',

  // Sequence errors
  SEQUENCE_EMPTY: 'SEQUENCE_EMPTY',
  ACTION_UNRESOLVED: 'ACTION_UNRESOLVED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Codes raised before any step runs */
export const CONFIGURATION_ERROR_CODES: readonly ErrorCode[] = [
  ErrorCode.CONFIG_NOT_FOUND,
  ErrorCode.CONFIG_PARSE_ERROR,
  ErrorCode.CONFIG_VALIDATION_ERROR,
  ErrorCode.SEQUENCE_EMPTY,
  ErrorCode.ACTION_UNRESOLVED,
];

/** Provisioner error with code and optional remediation hint */
export class ProvisionError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'ProvisionError';
  }

  get isConfigurationError(): boolean {
    return CONFIGURATION_ERROR_CODES.includes(this.code);
  }
}
