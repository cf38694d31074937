import { describe, expect, it } from 'vitest';
import { defaultParameters } from './baseConfig';
import { baselineFields, clampToField, parameterFields } from './parameterFields';
import { applyScenarioParameters, getScenarioParameters, scenarios } from './scenarios';

describe('scenario presets', () => {
  it('overrides only the parameters a scenario names', () => {
    const params = applyScenarioParameters(defaultParameters, 'catastrophe-year');

    expect(params).toEqual({
      ...defaultParameters,
      attritionalLossRatio: 70,
      catastrophicImpact: 25,
      economicDownturnImpact: 5,
    });
    expect(defaultParameters.catastrophicImpact).toBe(5);
  });

  it('returns the base parameters for an unknown or missing scenario', () => {
    expect(applyScenarioParameters(defaultParameters, 'no-such-scenario')).toBe(defaultParameters);
    expect(applyScenarioParameters(defaultParameters, null)).toBe(defaultParameters);
    expect(getScenarioParameters('baseline')).toEqual(defaultParameters);
  });

  it('keeps every preset inside the input ranges', () => {
    scenarios.forEach((scenario) => {
      const params = getScenarioParameters(scenario.id);
      parameterFields.forEach((field) => {
        expect(params[field.key], `${scenario.id}.${field.key}`).toBe(clampToField(field, params[field.key]));
      });
    });
  });
});

describe('input field catalogue', () => {
  it('describes all eleven percentage inputs once', () => {
    const keys = parameterFields.map((f) => f.key).sort();

    expect(keys).toEqual(Object.keys(defaultParameters).sort());
  });

  it('uses the defaults as field defaults', () => {
    parameterFields.forEach((field) => {
      expect(field.defaultValue).toBe(defaultParameters[field.key]);
      expect(field.defaultValue).toBeGreaterThanOrEqual(field.min);
      expect(field.defaultValue).toBeLessThanOrEqual(field.max);
    });
  });

  it('clamps collected values into range', () => {
    const gdp = parameterFields.find((f) => f.key === 'gdpGrowth');
    const life = baselineFields.find((f) => f.key === 'life');
    if (!gdp || !life) throw new Error('Missing field definitions');

    expect(clampToField(gdp, 25)).toBe(10);
    expect(clampToField(gdp, -8)).toBe(-5);
    expect(clampToField(gdp, Number.NaN)).toBe(3);
    expect(clampToField(life, -10)).toBe(0);
    expect(clampToField(life, 1e9)).toBe(1e9);
  });
});
