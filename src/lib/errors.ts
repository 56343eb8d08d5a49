/** Error categories for the updater */
export const ErrorCode = {
  // Config errors
  CONFIG_PARSE_ERROR: 'CONFIG_PARSE_ERROR',
  CONFIG_VALIDATION_ERROR: 'CONFIG_VALIDATION_ERROR',

  // Catalog errors
  CATALOG_NOT_FOUND: 'CATALOG_NOT_FOUND',
  CATALOG_INVALID: 'CATALOG_INVALID',

  // Orchestration errors
  STEP_TRANSITION_INVALID: 'STEP_TRANSITION_INVALID',
  CONFIRMATION_FAILED: 'CONFIRMATION_FAILED',

  // Collaborator errors (never fatal)
  NOTIFICATION_FAILED: 'NOTIFICATION_FAILED',

  // CLI errors
  INTERACTIVE_REQUIRED: 'INTERACTIVE_REQUIRED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Updater error with code and optional remediation hint */
export class UpdaterError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'UpdaterError';
  }
}

/** Exit codes used by the CLI */
export function exitCodeFor(code: ErrorCode): number {
  switch (code) {
    case ErrorCode.CONFIG_PARSE_ERROR:
    case ErrorCode.CONFIG_VALIDATION_ERROR:
    case ErrorCode.CATALOG_INVALID:
    case ErrorCode.CATALOG_NOT_FOUND:
      return 3;
    default:
      return 1;
  }
}
