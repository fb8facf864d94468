import { RuleTableDefectError } from './errors';
import { appendOutput, closeAccumulators, openAccumulators } from './variants';

describe('variant accumulators', () => {
  it('should give every accumulator one segment per append', () => {
    const accumulators = openAccumulators(['Peninsular', 'American']);
    const context = { ruleIndex: 0, offset: 0 };

    appendOutput(accumulators, 'ka', context);
    appendOutput(accumulators, ['θ', 's'], context);
    appendOutput(accumulators, '', context);

    expect(accumulators.map((a) => a.segments)).toEqual([
      ['ka', 'θ', ''],
      ['ka', 's', ''],
    ]);
    expect(closeAccumulators(accumulators)).toEqual([
      { label: 'Peninsular', text: '/kaθ/' },
      { label: 'American', text: '/kas/' },
    ]);
  });

  it('should leave accumulators untouched when the count is wrong', () => {
    const accumulators = openAccumulators(['Only']);

    expect(() =>
      appendOutput(accumulators, ['a', 'b'], { ruleIndex: 4, offset: 2 }),
    ).toThrow(RuleTableDefectError);
    expect(accumulators[0].segments).toEqual([]);
  });
});
