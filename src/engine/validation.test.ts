import { describe, expect, it } from 'vitest';
import { defaultBaseline, defaultParameters } from '../config/baseConfig';
import { assertValidProjectionInput, InvalidParameterError, validateProjectionInput } from './validation';

describe('projection input validation', () => {
  it('accepts the default assumptions', () => {
    expect(validateProjectionInput(defaultBaseline, defaultParameters)).toEqual([]);
    expect(() => assertValidProjectionInput(defaultBaseline, defaultParameters)).not.toThrow();
  });

  it('rejects loss and expense ratios that together exceed the premium', () => {
    const issues = validateProjectionInput(defaultBaseline, {
      ...defaultParameters,
      attritionalLossRatio: 100,
      expenseRatio: 50,
    });

    expect(issues).toEqual([{ field: 'attritionalLossRatio+expenseRatio', value: 150, domain: '<= 100' }]);
  });

  it('rejects a negative baseline', () => {
    const issues = validateProjectionInput({ life: -1, nonLife: 200 }, defaultParameters);

    expect(issues).toEqual([{ field: 'life', value: -1, domain: '>= 0' }]);
  });

  it('flags non-finite inputs and the sums they feed', () => {
    const issues = validateProjectionInput(defaultBaseline, { ...defaultParameters, gdpGrowth: Number.NaN });

    expect(issues.map((i) => i.field)).toEqual(['gdpGrowth', 'gdpGrowth+inflationRate']);
    expect(issues[0].domain).toBe('a finite number');
  });

  it('bounds multipliers that would go negative', () => {
    const issues = validateProjectionInput(defaultBaseline, {
      ...defaultParameters,
      regulatoryImpact: -150,
      churnRate: 120,
    });

    expect(issues).toEqual([
      { field: 'churnRate', value: 120, domain: '0..100' },
      { field: 'regulatoryImpact', value: -150, domain: '>= -100' },
    ]);
  });

  it('throws InvalidParameterError listing every issue', () => {
    const run = () =>
      assertValidProjectionInput({ life: -5, nonLife: 200 }, { ...defaultParameters, catastrophicImpact: -1 });

    expect(run).toThrow(InvalidParameterError);
    try {
      run();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidParameterError);
      if (!(err instanceof InvalidParameterError)) return;
      expect(err.kind).toBe('InvalidParameter');
      expect(err.issues.map((i) => i.field)).toEqual(['life', 'catastrophicImpact']);
      expect(err.message).toBe(
        'Invalid projection input: life=-5 (expected >= 0); catastrophicImpact=-1 (expected >= 0)'
      );
    }
  });
});
