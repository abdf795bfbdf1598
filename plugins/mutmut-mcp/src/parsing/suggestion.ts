import type { SurvivorRecord } from '../types/mutation.js';

export interface ModuleGroup {
  readonly module: string;
  readonly mutationIds: readonly string[];
}

export const NO_SURVIVORS_MESSAGE = 'No surviving mutants found. No additional test coverage is suggested.';

/**
 * Module a survivor belongs to: the location without a trailing `:<line>`, and for
 * dotted mutmut qualifiers without the final `x_<function>` / `xǁ<Class>ǁ<method>` segment.
 */
export function moduleOf(location: string): string {
  const withoutLine = location.replace(/:\d+$/, '');
  if (/[\\/]/.test(withoutLine)) return withoutLine;

  const segments = withoutLine.split('.');
  const last = segments[segments.length - 1] ?? '';
  if (segments.length > 1 && /^xǁ|^x_/.test(last)) {
    return segments.slice(0, -1).join('.');
  }
  return withoutLine;
}

/** Groups by module, most survivors first; ties keep first-seen order. */
export function rankModules(survivors: readonly SurvivorRecord[]): ModuleGroup[] {
  const groups = new Map<string, string[]>();
  for (const survivor of survivors) {
    const key = moduleOf(survivor.location);
    const ids = groups.get(key);
    if (ids) ids.push(survivor.mutationId);
    else groups.set(key, [survivor.mutationId]);
  }

  // Array.prototype.sort is stable, and Map iteration preserves first-seen order.
  return [...groups.entries()]
    .map(([module, mutationIds]) => ({ module, mutationIds }))
    .sort((a, b) => b.mutationIds.length - a.mutationIds.length);
}

export function renderSuggestion(survivors: readonly SurvivorRecord[]): string {
  const ranked = rankModules(survivors);
  if (ranked.length === 0) return NO_SURVIVORS_MESSAGE;

  const lines = ['Modules most in need of additional test coverage:'];
  ranked.forEach((group, index) => {
    const count = group.mutationIds.length;
    lines.push(`${index + 1}. ${group.module}: ${count} surviving mutant${count === 1 ? '' : 's'} [${group.mutationIds.join(', ')}]`);
  });
  lines.push('', 'Inspect a mutant with show_mutant, add a test that fails against it, then rerun_mutmut_on_survivor.');
  return lines.join('\n');
}
