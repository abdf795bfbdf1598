/** Counts per mutant outcome, as reported by `mutmut results` or a run's progress line. */
export interface MutationSummary {
  readonly total: number;
  readonly killed: number;
  readonly survived: number;
  readonly timeout: number;
  readonly suspicious: number;
  readonly skipped: number;
  readonly rawText: string;
}

export interface SurvivorRecord {
  readonly mutationId: string;
  /** `file`, `file:line` or a dotted mutmut qualifier. */
  readonly location: string;
  readonly diff?: string;
}

export interface PrioritizedSurvivor {
  readonly mutationId: string;
  readonly location: string;
  /** 1 = likely material logic, 0 = likely logging/debug output only. */
  readonly score: number;
  readonly reason: string;
}
