// Operation orchestrator: resolve environment -> invoke mutmut -> parse output.
// Every public method returns an OperationOutcome; MutmutErrors and unexpected
// exceptions are converted to Failure values here and never cross this boundary.
import type { ServerConfig, OperationName } from '../types/config.js';
import type { ExecutionContext, ProcessResult } from '../types/process.js';
import type { MutationSummary, PrioritizedSurvivor, SurvivorRecord } from '../types/mutation.js';
import { success, failure, type OperationOutcome } from '../types/outcome.js';
import type { ProcessRunner } from '../execution/runner.js';
import type { EnvironmentResolver } from '../environment/resolver.js';
import { MutmutError, MutmutErrorCode, isProcessErrorCode } from '../shared/errors.js';
import { parseResults } from '../parsing/results.js';
import { parseSurvivors } from '../parsing/survivors.js';
import { renderSuggestion } from '../parsing/suggestion.js';
import { prioritizeSurvivors } from '../parsing/prioritize.js';
import { parseRunStatus, parseCleanStatus, parseMutantDiff } from '../parsing/status.js';
import { logger } from '../logger.js';

export interface OrchestratorDeps {
  readonly resolver: EnvironmentResolver;
  readonly runner: ProcessRunner;
  readonly timeouts: ServerConfig['timeouts'];
}

export interface RunMutmutArgs {
  target: string;
  testCommand?: string;
  options?: string;
  venvPath?: string;
}

type Parser<T> = (stdout: string, stderr: string, exitCode: number) => T;

export class MutmutOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  runMutmut(args: RunMutmutArgs): Promise<OperationOutcome<string>> {
    return this.guard('run_mutmut', async () => {
      const target = args.target.trim();
      const testCommand = (args.testCommand ?? 'pytest').trim();
      if (!target) {
        throw new MutmutError(MutmutErrorCode.VALIDATION_ERROR, 'target is required: name the module or package to mutate');
      }
      if (!testCommand) {
        throw new MutmutError(MutmutErrorCode.VALIDATION_ERROR, 'test_command must not be empty');
      }
      const extra = splitOptions(args.options ?? '');
      const argv = ['run', '--paths-to-mutate', target, '--runner', testCommand, ...extra];
      return this.invoke('run', argv, args.venvPath, parseRunStatus);
    });
  }

  showResults(venvPath?: string): Promise<OperationOutcome<MutationSummary>> {
    return this.guard('show_results', () => this.invoke('results', ['results'], venvPath, parseResults));
  }

  /** With `includeDiffs`, each survivor's diff is fetched with `mutmut show`, one process at a time. */
  showSurvivors(venvPath?: string, includeDiffs = false): Promise<OperationOutcome<SurvivorRecord[]>> {
    return this.guard('show_survivors', async () => {
      const context = await this.deps.resolver.resolve(venvPath);
      const survivors = await this.execute('survivors', context, ['survivors'], parseSurvivors);
      if (!includeDiffs) return survivors;

      const withDiffs: SurvivorRecord[] = [];
      for (const survivor of survivors) {
        const diff = await this.execute('show', context, ['show', survivor.mutationId], parseMutantDiff);
        withDiffs.push({ ...survivor, diff });
      }
      return withDiffs;
    });
  }

  /**
   * Ranks modules by surviving mutants. Pass `survivors` when they were already
   * fetched in the same request to skip the extra `mutmut survivors` call.
   */
  generateTestSuggestion(venvPath?: string, survivors?: readonly SurvivorRecord[]): Promise<OperationOutcome<string>> {
    return this.guard('generate_test_suggestion', async () => {
      const records = survivors ?? (await this.invoke('survivors', ['survivors'], venvPath, parseSurvivors));
      return renderSuggestion(records);
    });
  }

  rerunMutmutOnSurvivor(mutationId?: string, venvPath?: string): Promise<OperationOutcome<string>> {
    return this.guard('rerun_mutmut_on_survivor', () => {
      const id = mutationId?.trim();
      const argv = id ? ['run', '--rerun', id] : ['run', '--rerun-all'];
      return this.invoke('rerun', argv, venvPath, parseRunStatus);
    });
  }

  /** Deletes mutmut's cache. Irreversible; callers own the decision to call it. */
  cleanMutmutCache(venvPath?: string): Promise<OperationOutcome<string>> {
    return this.guard('clean_mutmut_cache', () => this.invoke('clean', ['clean'], venvPath, parseCleanStatus));
  }

  showMutant(mutationId: string, venvPath?: string): Promise<OperationOutcome<string>> {
    return this.guard('show_mutant', async () => {
      const id = mutationId.trim();
      if (!id) {
        throw new MutmutError(MutmutErrorCode.VALIDATION_ERROR, 'mutation_id is required');
      }
      return this.invoke('show', ['show', id], venvPath, parseMutantDiff);
    });
  }

  prioritizeSurvivors(venvPath?: string): Promise<OperationOutcome<PrioritizedSurvivor[]>> {
    return this.guard('prioritize_survivors', async () => {
      const survivors = await this.invoke('survivors', ['survivors'], venvPath, parseSurvivors);
      return prioritizeSurvivors(survivors);
    });
  }

  private async invoke<T>(operation: OperationName, argv: string[], venvPath: string | undefined, parse: Parser<T>): Promise<T> {
    const context = await this.deps.resolver.resolve(venvPath);
    return this.execute(operation, context, argv, parse);
  }

  private async execute<T>(operation: OperationName, context: ExecutionContext, argv: string[], parse: Parser<T>): Promise<T> {
    const timeout = this.deps.timeouts[operation];
    const result: ProcessResult = await this.deps.runner.run({
      command: [context.executablePath, ...argv],
      context,
      ...(timeout !== null && { timeoutSeconds: timeout }),
    });
    return parse(result.stdout, result.stderr, result.exitCode);
  }

  private async guard<T>(operation: string, body: () => Promise<T>): Promise<OperationOutcome<T>> {
    try {
      return success(await body());
    } catch (err) {
      if (err instanceof MutmutError) {
        if (isProcessErrorCode(err.code)) {
          logger.warn({ operation, code: err.code, pid: err.context?.pid }, err.message);
        } else {
          logger.info({ operation, code: err.code }, err.message);
        }
        return failure(err.code, err.message, err.context?.stderr);
      }
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ operation, error: message }, 'Unexpected error during operation');
      return failure(MutmutErrorCode.INTERNAL_ERROR, message);
    }
  }
}

/** Free-form mutmut options, split on whitespace. */
export function splitOptions(options: string): string[] {
  return options.split(/\s+/).filter(Boolean);
}
