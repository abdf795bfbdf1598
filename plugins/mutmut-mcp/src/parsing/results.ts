import type { MutationSummary } from '../types/mutation.js';
import { MutmutError, MutmutErrorCode } from '../shared/errors.js';

type Counts = Omit<MutationSummary, 'rawText'>;

// `⠙ 24/24  🎉 20 🫥 0  ⏰ 0  🤔 0  🙁 4  🔇 0`; the 🫥 (no tests) column only exists in newer mutmut.
const PROGRESS_LINE = /(\d+)\/(\d+)\s+🎉\s*(\d+)(?:\s+🫥\s*(\d+))?\s+⏰\s*(\d+)\s+🤔\s*(\d+)\s+🙁\s*(\d+)\s+🔇\s*(\d+)/u;

// `    app.core.x_total__mutmut_3: survived`
const STATUS_LINE = /^\s*(\S+__mutmut_\d+):\s*([a-z][a-z ]*?)\s*$/i;

// Labels must open the line, so `---- src/app/timeout.py (1) ----` is not read as a count.
const LABELS: ReadonlyArray<{ key: keyof Counts; pattern: RegExp }> = [
  { key: 'killed', pattern: /^\s*killed\b[^\d\n]{0,16}?(\d+)/i },
  { key: 'survived', pattern: /^\s*survived\b[^\d\n]{0,16}?(\d+)/i },
  { key: 'timeout', pattern: /^\s*(?:timeout|timed out)\b[^\d\n]{0,16}?(\d+)/i },
  { key: 'suspicious', pattern: /^\s*suspicious\b[^\d\n]{0,16}?(\d+)/i },
  { key: 'skipped', pattern: /^\s*skipped\b[^\d\n]{0,16}?(\d+)/i },
  { key: 'total', pattern: /^\s*total\b[^\d\n]{0,16}?(\d+)/i },
];

/** Splits tool output into lines, treating the `\r` of redrawn progress bars as a break. */
export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}

/** Counts from the last mutmut progress line in `text`, if any. */
export function parseProgressLine(text: string): Counts | undefined {
  let counts: Counts | undefined;
  for (const line of splitLines(text)) {
    const m = PROGRESS_LINE.exec(line);
    if (!m) continue;
    const n = (i: number): number => Number(m[i] ?? 0);
    counts = { total: n(2), killed: n(3), timeout: n(5), suspicious: n(6), survived: n(7), skipped: n(8) };
  }
  return counts;
}

function parseStatusListing(text: string): Counts | undefined {
  const counts = { total: 0, killed: 0, survived: 0, timeout: 0, suspicious: 0, skipped: 0 };
  for (const line of splitLines(text)) {
    const m = STATUS_LINE.exec(line);
    if (!m) continue;
    counts.total++;
    const status = (m[2] ?? '').toLowerCase();
    if (status === 'killed') counts.killed++;
    else if (status === 'survived') counts.survived++;
    else if (status === 'timeout') counts.timeout++;
    else if (status === 'suspicious') counts.suspicious++;
    else if (status === 'skipped') counts.skipped++;
  }
  return counts.total > 0 ? counts : undefined;
}

function parseLabelledCounts(text: string): Counts | undefined {
  const found: Partial<Record<keyof Counts, number>> = {};
  for (const line of splitLines(text)) {
    for (const { key, pattern } of LABELS) {
      if (found[key] !== undefined) continue;
      const m = pattern.exec(line);
      if (m?.[1] !== undefined) found[key] = Number(m[1]);
    }
  }
  if (Object.keys(found).length === 0) return undefined;

  const killed = found.killed ?? 0;
  const survived = found.survived ?? 0;
  const timeout = found.timeout ?? 0;
  const suspicious = found.suspicious ?? 0;
  const skipped = found.skipped ?? 0;
  return {
    total: found.total ?? killed + survived + timeout + suspicious + skipped,
    killed,
    survived,
    timeout,
    suspicious,
    skipped,
  };
}

/**
 * Extracts a MutationSummary from `mutmut results` output.
 * Recognizes a progress line, a per-mutant status listing, or labelled counts, in that order.
 * Never returns a zeroed summary for output it does not understand.
 */
export function parseResults(stdout: string, stderr: string, exitCode: number): MutationSummary {
  const counts = parseProgressLine(stdout) ?? parseStatusListing(stdout) ?? parseLabelledCounts(stdout);
  if (counts) {
    return { ...counts, rawText: stdout };
  }

  if (exitCode !== 0) {
    throw new MutmutError(MutmutErrorCode.TOOL_FAILURE, `mutmut results exited with ${exitCode} and reported no summary`, {
      stdout,
      stderr,
      exitCode,
    });
  }
  throw new MutmutError(MutmutErrorCode.PARSE_ERROR, 'unrecognized results format', { stdout });
}
