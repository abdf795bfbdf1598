import { prioritizeSurvivors } from '../../../src/parsing/prioritize.js';

describe('prioritizeSurvivors', () => {
  it('puts material survivors first and keeps order within a score', () => {
    const ranked = prioritizeSurvivors([
      { mutationId: 'app.log.x_emit__mutmut_2', location: 'app.log.x_emit' },
      { mutationId: 'app.core.x_total__mutmut_1', location: 'app.core.x_total' },
      {
        mutationId: 'app.core.x_sum__mutmut_3',
        location: 'app.core.x_sum',
        diff: '-    logger.info("sum")\n+    logger.info("XXsumXX")\n',
      },
      { mutationId: 'app.core.x_avg__mutmut_4', location: 'app.core.x_avg' },
    ]);

    expect(ranked.map(r => [r.mutationId, r.score])).toEqual([
      ['app.core.x_total__mutmut_1', 1],
      ['app.core.x_avg__mutmut_4', 1],
      ['app.log.x_emit__mutmut_2', 0],
      ['app.core.x_sum__mutmut_3', 0],
    ]);
    expect(ranked[0]?.reason).toBe('Potentially material logic, prioritize.');
    expect(ranked[2]?.reason).toBe('Likely log/debug only, deprioritized.');
  });

  it('returns an empty list for no survivors', () => {
    expect(prioritizeSurvivors([])).toEqual([]);
  });
});
