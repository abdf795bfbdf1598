/** Where and how the mutmut executable is launched. */
export interface ExecutionContext {
  readonly executablePath: string;
  readonly workingDirectory: string;
  readonly environmentOverrides: Readonly<Record<string, string>>;
}

/**
 * A structured command ready for execution.
 * `command[0]` is the program; the rest are its arguments, never shell-parsed.
 */
export interface ProcessInvocation {
  readonly command: readonly string[];
  readonly context: ExecutionContext;
  readonly timeoutSeconds?: number;
}

export interface ProcessResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}
