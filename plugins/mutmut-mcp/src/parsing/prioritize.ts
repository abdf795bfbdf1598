import type { PrioritizedSurvivor, SurvivorRecord } from '../types/mutation.js';

const LOGGING_KEYWORDS = ['log', 'debug', 'print', 'logger', 'logging'];

/** Material logic first; survivors that only touch logging or debug output sink to the end. */
export function prioritizeSurvivors(survivors: readonly SurvivorRecord[]): PrioritizedSurvivor[] {
  return survivors
    .map((survivor): PrioritizedSurvivor => {
      const haystack = `${survivor.mutationId} ${survivor.location} ${survivor.diff ?? ''}`.toLowerCase();
      const loggingOnly = LOGGING_KEYWORDS.some(keyword => haystack.includes(keyword));
      return {
        mutationId: survivor.mutationId,
        location: survivor.location,
        score: loggingOnly ? 0 : 1,
        reason: loggingOnly ? 'Likely log/debug only, deprioritized.' : 'Potentially material logic, prioritize.',
      };
    })
    .sort((a, b) => b.score - a.score);
}
