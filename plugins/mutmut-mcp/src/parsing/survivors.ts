import type { SurvivorRecord } from '../types/mutation.js';
import { MutmutError, MutmutErrorCode } from '../shared/errors.js';
import { splitLines } from './results.js';

// `    app.core.x_total__mutmut_3: survived`
const STATUS_ENTRY = /^\s*((\S+)__mutmut_\d+):\s*survived\s*$/i;

// `SURVIVED: app.core.total:42 (replaced + with -)`
const TAGGED_ENTRY = /^\s*SURVIVED:\s*(\S+:\d+)(?:\s|$)/;

// Section headings of the older grouped listing, e.g. `Survived 🙁 (2)` or `Timed out ⏰ (1)`.
const SECTION_HEADING = /^\s*(survived|killed|timed out|suspicious|skipped|untested|not checked)\b.*\(\d+\)\s*$/i;

// `---- src/app/core.py (2) ----`
const FILE_HEADING = /^\s*-{2,}\s+(.+?)\s+\(\d+\)\s+-{2,}\s*$/;

// `1, 3-5, 9`
const ID_LIST = /^\s*\d+(?:-\d+)?(?:\s*,\s*\d+(?:-\d+)?)*\s*$/;

// Widest id range expanded; wider or reversed ranges are malformed and skipped.
const MAX_RANGE_SPAN = 10_000;

function expandIds(line: string): string[] {
  const ids: string[] = [];
  for (const part of line.split(',')) {
    const [start, end] = part.trim().split('-').map(Number);
    if (start === undefined || Number.isNaN(start)) continue;
    const last = end === undefined || Number.isNaN(end) ? start : end;
    if (last < start || last - start >= MAX_RANGE_SPAN) continue;
    for (let id = start; id <= last; id++) ids.push(String(id));
  }
  return ids;
}

/**
 * Extracts surviving mutants from `mutmut survivors` (or `results`) output,
 * in the order mutmut printed them. Lines without both an id and a location are skipped.
 */
export function parseSurvivors(stdout: string, stderr: string, exitCode: number): SurvivorRecord[] {
  const records: SurvivorRecord[] = [];
  let inSurvivedSection = false;
  let currentFile: string | undefined;

  for (const line of splitLines(stdout)) {
    const status = STATUS_ENTRY.exec(line);
    if (status?.[1] && status[2]) {
      records.push({ mutationId: status[1], location: status[2] });
      continue;
    }

    const tagged = TAGGED_ENTRY.exec(line);
    if (tagged?.[1]) {
      records.push({ mutationId: tagged[1], location: tagged[1] });
      continue;
    }

    const section = SECTION_HEADING.exec(line);
    if (section?.[1]) {
      inSurvivedSection = section[1].toLowerCase() === 'survived';
      currentFile = undefined;
      continue;
    }

    const file = FILE_HEADING.exec(line);
    if (file?.[1]) {
      currentFile = file[1];
      continue;
    }

    if (inSurvivedSection && currentFile && ID_LIST.test(line)) {
      for (const id of expandIds(line)) {
        records.push({ mutationId: id, location: currentFile });
      }
    }
  }

  if (records.length === 0 && exitCode !== 0) {
    throw new MutmutError(MutmutErrorCode.TOOL_FAILURE, `mutmut survivors exited with ${exitCode} and listed no survivors`, {
      stdout,
      stderr,
      exitCode,
    });
  }
  return records;
}
