/** mutmut operations that spawn a subprocess; each has its own timeout. */
export type OperationName = 'run' | 'results' | 'survivors' | 'rerun' | 'clean' | 'show';

export interface ServerConfig {
  /** Ambient mutmut command, resolved on PATH when no venv is given. */
  executable: string;
  /** Seconds per operation; null disables the timeout. */
  timeouts: Record<OperationName, number | null>;
  /** Extra variables merged into every subprocess environment. */
  env: Record<string, string>;
}
