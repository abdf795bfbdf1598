import type { MutmutErrorCode } from '../shared/errors.js';

export interface Success<T> {
  readonly status: 'success';
  readonly payload: T;
}

export interface Failure {
  readonly status: 'failure';
  readonly kind: MutmutErrorCode;
  readonly message: string;
  readonly rawStderr?: string;
}

/** The single return shape of every orchestrator operation. */
export type OperationOutcome<T> = Success<T> | Failure;

export function success<T>(payload: T): Success<T> {
  return { status: 'success', payload };
}

export function failure(kind: MutmutErrorCode, message: string, rawStderr?: string): Failure {
  return rawStderr ? { status: 'failure', kind, message, rawStderr } : { status: 'failure', kind, message };
}
