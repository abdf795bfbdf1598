import { MutmutError, MutmutErrorCode } from '../shared/errors.js';

function passThrough(stdout: string, stderr: string): string {
  return stdout.trim() ? stdout : stderr;
}

function toolFailure(operation: string, stdout: string, stderr: string, exitCode: number): MutmutError {
  return new MutmutError(MutmutErrorCode.TOOL_FAILURE, `mutmut ${operation} exited with ${exitCode}`, { stdout, stderr, exitCode });
}

/**
 * Status text of `mutmut run` / `mutmut run --rerun*`. Any nonzero exit is a failure,
 * including the codes mutmut uses to flag surviving mutants; the run's output stays in the error context.
 */
export function parseRunStatus(stdout: string, stderr: string, exitCode: number): string {
  if (exitCode !== 0) throw toolFailure('run', stdout, stderr, exitCode);
  return passThrough(stdout, stderr);
}

export function parseCleanStatus(stdout: string, stderr: string, exitCode: number): string {
  if (exitCode !== 0) throw toolFailure('clean', stdout, stderr, exitCode);
  return passThrough(stdout, stderr) || 'mutmut cache cleaned.';
}

/** Diff of a single mutant from `mutmut show <id>`. */
export function parseMutantDiff(stdout: string, stderr: string, exitCode: number): string {
  if (exitCode !== 0 || !stdout.trim()) throw toolFailure('show', stdout, stderr, exitCode);
  return stdout;
}
