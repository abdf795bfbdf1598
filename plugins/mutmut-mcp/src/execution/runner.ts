// Process layer: every mutmut invocation passes through ProcessRunner.run().
// A nonzero exit is not an error here; mutmut exits nonzero whenever mutants
// survive, so interpreting the code belongs to the parsers.
import { once } from 'node:events';
import execa from 'execa';
import type { ProcessInvocation, ProcessResult } from '../types/process.js';
import { MutmutError, MutmutErrorCode } from '../shared/errors.js';
import { logger } from '../logger.js';

/** Exit code reported for a child killed by a signal outside a timeout. */
export const SIGNAL_EXIT_CODE = 128;

/** Grace period between SIGTERM and SIGKILL after a timeout. */
const FORCE_KILL_AFTER_MS = 2000;

export interface ProcessRunner {
  run(invocation: ProcessInvocation): Promise<ProcessResult>;
}

export class ExecaProcessRunner implements ProcessRunner {
  async run(invocation: ProcessInvocation): Promise<ProcessResult> {
    const [file, ...args] = invocation.command;
    if (!file) {
      throw new MutmutError(MutmutErrorCode.LAUNCH_FAILURE, 'Empty command');
    }

    const { context, timeoutSeconds } = invocation;
    logger.debug({ command: invocation.command, cwd: context.workingDirectory, timeoutSeconds }, 'Spawning subprocess');

    let subprocess: execa.ExecaChildProcess;
    let result: execa.ExecaReturnValue;
    try {
      subprocess = execa(file, args, {
        cwd: context.workingDirectory,
        env: { ...context.environmentOverrides },
        extendEnv: true,
        timeout: timeoutSeconds ? Math.round(timeoutSeconds * 1000) : undefined,
        forceKillAfterTimeout: FORCE_KILL_AFTER_MS,
        stdin: 'ignore',
        stripFinalNewline: false,
        reject: false,
      });
      result = await subprocess;
    } catch (err) {
      throw new MutmutError(MutmutErrorCode.LAUNCH_FAILURE, `Command failed to spawn: ${file}`, {
        stderr: err instanceof Error ? err.message : String(err),
      });
    }

    const pid = subprocess.pid;
    if (result.timedOut) {
      // execa settles as soon as it signals the child; wait until the child is actually gone.
      await waitForExit(subprocess);
      logger.warn({ command: invocation.command, timeoutSeconds, pid }, 'Subprocess timed out and was terminated');
      throw new MutmutError(MutmutErrorCode.TIMEOUT, `${file} exceeded its ${timeoutSeconds}s timeout and was terminated`, {
        stdout: result.stdout,
        stderr: result.stderr,
        pid,
      });
    }

    const exitCode = exitCodeOf(result);
    if (exitCode === undefined && !result.signal) {
      // execa resolves spawn errors (ENOENT, EACCES, bad cwd) as failed results without an exit code.
      const reason = result instanceof Error ? result.message : 'no exit code reported';
      logger.warn({ command: invocation.command, error: reason }, 'Subprocess could not be launched');
      throw new MutmutError(MutmutErrorCode.LAUNCH_FAILURE, `Could not launch ${file}`, {
        stderr: result.stderr || reason,
      });
    }

    return {
      exitCode: exitCode ?? SIGNAL_EXIT_CODE,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }
}

async function waitForExit(child: execa.ExecaChildProcess): Promise<void> {
  if (child.exitCode !== null || child.signalCode !== null) return;
  await once(child, 'exit');
}

function exitCodeOf(result: execa.ExecaReturnValue): number | undefined {
  return Number.isInteger(result.exitCode) ? result.exitCode : undefined;
}
