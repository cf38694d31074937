import { describe, expect, it } from 'vitest';
import { baseConfig, defaultBaseline, defaultParameters } from '../config/baseConfig';
import { ProjectionController } from './projectionController';
import type { ProjectionOutcome } from './projectionController';

const recordsOf = (outcome: ProjectionOutcome) => {
  if (!outcome.ok) throw new Error(`Expected a projection, got ${outcome.error.message}`);
  return outcome.run.records;
};

describe('ProjectionController', () => {
  it('runs the engine once on construction with the defaults', () => {
    const controller = new ProjectionController();
    const { baseline, params, scenarioId, outcome } = controller.snapshot();

    expect(controller.runCount).toBe(1);
    expect(baseline).toEqual(defaultBaseline);
    expect(params).toEqual(defaultParameters);
    expect(scenarioId).toBeNull();
    expect(recordsOf(outcome)[0]).toEqual({ yearIndex: 1, gwpLife: 34.72, gwpNonLife: 69.43 });
  });

  it('re-runs once per change and clamps to the widget range', () => {
    const controller = new ProjectionController();

    const outcome = controller.setParameter('catastrophicImpact', 200);

    expect(controller.runCount).toBe(2);
    expect(controller.snapshot().params.catastrophicImpact).toBe(50);
    expect(recordsOf(outcome).map((r) => r.gwpLife)).toEqual([17.74, 3.15, 0.56, 0.1, 0.02]);
  });

  it('clamps a negative baseline to zero', () => {
    const controller = new ProjectionController();

    const records = recordsOf(controller.setBaseline('life', -10));

    expect(controller.snapshot().baseline.life).toBe(0);
    expect(records.every((r) => r.gwpLife === 0)).toBe(true);
    expect(records[0].gwpNonLife).toBe(69.43);
  });

  it('hands the engine frozen copies and leaves the defaults untouched', () => {
    const controller = new ProjectionController();
    controller.setParameter('gdpGrowth', 7);

    const { params, baseline } = controller.snapshot();
    expect(Object.isFrozen(params)).toBe(true);
    expect(Object.isFrozen(baseline)).toBe(true);
    expect(defaultParameters.gdpGrowth).toBe(3);
  });

  it('applies scenario presets and resets back to the defaults', () => {
    const controller = new ProjectionController();

    const records = recordsOf(controller.selectScenario('catastrophe-year'));
    expect(controller.snapshot().scenarioId).toBe('catastrophe-year');
    expect(controller.snapshot().params.catastrophicImpact).toBe(25);
    expect(records.map((r) => r.gwpLife)).toEqual([19.81, 3.92, 0.78, 0.15, 0.03]);
    expect(records.map((r) => r.gwpNonLife)).toEqual([39.62, 7.85, 1.55, 0.31, 0.06]);

    controller.reset();
    expect(controller.snapshot().scenarioId).toBeNull();
    expect(controller.snapshot().params).toEqual(defaultParameters);
    expect(controller.runCount).toBe(3);
  });

  it('drops the scenario label after a manual parameter edit', () => {
    const controller = new ProjectionController();
    controller.selectScenario('catastrophe-year');

    controller.setBaseline('life', 150);
    expect(controller.snapshot().scenarioId).toBe('catastrophe-year');

    controller.setParameter('catastrophicImpact', 10);
    const { scenarioId, params } = controller.snapshot();
    expect(scenarioId).toBeNull();
    expect(params.catastrophicImpact).toBe(10);
    expect(params.attritionalLossRatio).toBe(70);
  });

  it('surfaces InvalidParameter under strict validation without partial results', () => {
    const controller = new ProjectionController({ ...baseConfig, validation: 'strict' });

    const outcome = controller.setParameter('attritionalLossRatio', 100);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('InvalidParameter');
    expect(outcome.error.issues).toEqual([
      { field: 'attritionalLossRatio+expenseRatio', value: 110, domain: '<= 100' },
    ]);
    expect(controller.snapshot().outcome).toBe(outcome);

    const relaxed = controller.setConfig(baseConfig);
    expect(recordsOf(relaxed).every((r) => r.gwpLife === 0)).toBe(true);
  });
});
