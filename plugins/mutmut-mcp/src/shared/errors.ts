export enum MutmutErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  ENVIRONMENT_ERROR = 'ENVIRONMENT_ERROR',
  LAUNCH_FAILURE = 'LAUNCH_FAILURE',
  TIMEOUT = 'TIMEOUT',
  PARSE_ERROR = 'PARSE_ERROR',
  TOOL_FAILURE = 'TOOL_FAILURE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface MutmutErrorContext {
  stdout?: string;
  stderr?: string;
  exitCode?: number;
  pid?: number;
  [key: string]: unknown;
}

export class MutmutError extends Error {
  readonly code: MutmutErrorCode;
  readonly context?: MutmutErrorContext;

  constructor(code: MutmutErrorCode, message: string, context?: MutmutErrorContext) {
    super(message);
    this.name = 'MutmutError';
    this.code = code;
    this.context = context;
  }
}

/** LAUNCH_FAILURE and TIMEOUT are raised by the process layer. */
export function isProcessErrorCode(code: MutmutErrorCode): boolean {
  return code === MutmutErrorCode.LAUNCH_FAILURE || code === MutmutErrorCode.TIMEOUT;
}
