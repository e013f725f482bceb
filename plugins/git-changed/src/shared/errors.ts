export enum GitChangedErrorCode {
  EXTERNAL_TOOL = 'EXTERNAL_TOOL',
  CONFIGURATION = 'CONFIGURATION',
}

export class GitChangedError extends Error {
  readonly code: GitChangedErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: GitChangedErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'GitChangedError';
    this.code = code;
    this.context = context;
  }
}

// git missing, non-zero exit, or no output where output was required
export class ExternalToolError extends GitChangedError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(GitChangedErrorCode.EXTERNAL_TOOL, message, context);
    this.name = 'ExternalToolError';
  }
}

// rejected before any git invocation
export class ConfigurationError extends GitChangedError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(GitChangedErrorCode.CONFIGURATION, message, context);
    this.name = 'ConfigurationError';
  }
}
