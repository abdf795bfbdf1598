import { z } from 'zod';
import type { ServerContext } from '../context.js';
import { registerTool } from '../helpers.js';

const venvPath = z
  .string()
  .optional()
  .describe("Path to the project's virtualenv. mutmut is run from its bin/ (Scripts\\ on Windows) directory; omit to use mutmut from PATH.");

export function registerMutmutTools(ctx: ServerContext): void {
  const { orchestrator } = ctx;

  registerTool(ctx, {
    name: 'run_mutmut',
    description: 'Run a full mutation testing session with mutmut on a module or package. Returns the run output, including killed, survived and timed-out counts.',
    inputSchema: z.object({
      target: z.string().describe('Module or package path to mutate, e.g. src/mypackage'),
      test_command: z.string().optional().default('pytest').describe('Command mutmut uses to run the tests'),
      options: z.string().optional().default('').describe("Extra mutmut command-line options, e.g. '--use-coverage'"),
      venv_path: venvPath,
    }),
    annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: false },
  }, async (args) => orchestrator.runMutmut({
    target: args.target,
    testCommand: args.test_command,
    options: args.options,
    venvPath: args.venv_path,
  }));

  registerTool(ctx, {
    name: 'show_results',
    description: 'Summarize the last mutmut run: total, killed, survived, timeout, suspicious and skipped mutant counts.',
    inputSchema: z.object({ venv_path: venvPath }),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => orchestrator.showResults(args.venv_path));

  registerTool(ctx, {
    name: 'show_survivors',
    description: 'List surviving mutants from the last mutmut run, in the order mutmut reports them.',
    inputSchema: z.object({
      venv_path: venvPath,
      include_diffs: z.boolean().optional().default(false).describe('Also fetch each survivor\'s diff with mutmut show (one call per survivor)'),
    }),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => orchestrator.showSurvivors(args.venv_path, args.include_diffs));

  registerTool(ctx, {
    name: 'generate_test_suggestion',
    description: 'Rank modules by surviving mutants to show where additional tests are needed most.',
    inputSchema: z.object({ venv_path: venvPath }),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => orchestrator.generateTestSuggestion(args.venv_path));

  registerTool(ctx, {
    name: 'rerun_mutmut_on_survivor',
    description: 'Rerun mutmut on one surviving mutant, or on all survivors when mutation_id is omitted, after updating tests.',
    inputSchema: z.object({
      mutation_id: z.string().optional().describe('Mutant to rerun; omit to rerun every survivor'),
      venv_path: venvPath,
    }),
    annotations: { readOnlyHint: false, destructiveHint: false },
  }, async (args) => orchestrator.rerunMutmutOnSurvivor(args.mutation_id, args.venv_path));

  registerTool(ctx, {
    name: 'clean_mutmut_cache',
    description: 'Delete the mutmut cache. Irreversible: all recorded mutant outcomes are lost.',
    inputSchema: z.object({ venv_path: venvPath }),
    annotations: { readOnlyHint: false, destructiveHint: true, idempotentHint: true },
  }, async (args) => orchestrator.cleanMutmutCache(args.venv_path));

  registerTool(ctx, {
    name: 'show_mutant',
    description: 'Show the code diff of a single mutant.',
    inputSchema: z.object({
      mutation_id: z.string().describe('Mutant id as listed by show_survivors'),
      venv_path: venvPath,
    }),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => orchestrator.showMutant(args.mutation_id, args.venv_path));

  registerTool(ctx, {
    name: 'prioritize_survivors',
    description: 'Order surviving mutants by likely materiality; survivors that only touch logging or debug output come last.',
    inputSchema: z.object({ venv_path: venvPath }),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => orchestrator.prioritizeSurvivors(args.venv_path));
}
