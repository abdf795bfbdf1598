import fs from 'fs';
import path from 'path';
import { parseSurvivors } from '../../../src/parsing/survivors.js';
import { MutmutError, MutmutErrorCode } from '../../../src/shared/errors.js';

const fixture = (name: string): string => fs.readFileSync(path.join(__dirname, '../../fixtures', name), 'utf-8');

describe('parseSurvivors', () => {
  it('keeps only survived entries of a status listing, in order', () => {
    expect(parseSurvivors(fixture('results-status-listing.txt'), '', 0)).toEqual([
      { mutationId: 'app.core.x_total__mutmut_2', location: 'app.core.x_total' },
      { mutationId: 'app.core.x_total__mutmut_3', location: 'app.core.x_total' },
    ]);
  });

  it('returns N records for N entries interleaved with malformed lines', () => {
    const stdout = [
      '    app.core.x_total__mutmut_2: survived',
      'garbage line',
      '    app.core.x_total__mutmut_5: killed',
      ': survived',
      '    app.util.xǁFormatterǁrender__mutmut_1: survived',
      'SURVIVED: app.core.total',
      'SURVIVED:',
      'SURVIVED: app.log.emit:7 (replaced "a" with "XXaXX")',
    ].join('\n');

    expect(parseSurvivors(stdout, '', 0)).toEqual([
      { mutationId: 'app.core.x_total__mutmut_2', location: 'app.core.x_total' },
      { mutationId: 'app.util.xǁFormatterǁrender__mutmut_1', location: 'app.util.xǁFormatterǁrender' },
      { mutationId: 'app.log.emit:7', location: 'app.log.emit:7' },
    ]);
  });

  it('reads ids from the Survived section of a grouped listing only', () => {
    expect(parseSurvivors(fixture('results-grouped.txt'), '', 0)).toEqual([
      { mutationId: '1', location: 'src/app/core.py' },
      { mutationId: '3', location: 'src/app/core.py' },
      { mutationId: '7', location: 'src/app/util.py' },
    ]);
  });

  it('expands id ranges', () => {
    const stdout = 'Survived 🙁 (4)\n\n---- src/app/core.py (4) ----\n\n1, 3-5\n';
    expect(parseSurvivors(stdout, '', 0).map(r => r.mutationId)).toEqual(['1', '3', '4', '5']);
  });

  it('skips reversed and oversized id ranges', () => {
    const stdout = 'Survived 🙁 (3)\n\n---- src/app/core.py (3) ----\n\n2, 9-4, 1-999999999, 6-7\n';
    expect(parseSurvivors(stdout, '', 0).map(r => r.mutationId)).toEqual(['2', '6', '7']);
  });

  it('returns an empty list when nothing survived', () => {
    expect(parseSurvivors('', '', 0)).toEqual([]);
  });

  it('fails with TOOL_FAILURE when mutmut exited nonzero and listed nothing', () => {
    let err: unknown;
    try {
      parseSurvivors('', 'Error: no such command', 2);
    } catch (e) {
      err = e;
    }
    expect(err).toBeInstanceOf(MutmutError);
    expect(err instanceof MutmutError && err.code).toBe(MutmutErrorCode.TOOL_FAILURE);
  });
});
