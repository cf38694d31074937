import { baseConfig, defaultBaseline, defaultParameters } from '../config/baseConfig';
import { baselineFields, clampToField, parameterFields } from '../config/parameterFields';
import { applyScenarioParameters } from '../config/scenarios';
import type { ProjectionConfig } from '../domain/config';
import type { BaselineKey, BaselinePremium, ProjectionParameterKey, ProjectionParameters } from '../domain/projection';
import { createProjectionEngine } from '../engine/projection';
import type { ProjectionRun } from '../engine/projection';
import { InvalidParameterError } from '../engine/validation';

export type ProjectionOutcome = { ok: true; run: ProjectionRun } | { ok: false; error: InvalidParameterError };

export interface ControllerSnapshot {
  baseline: Readonly<BaselinePremium>;
  params: Readonly<ProjectionParameters>;
  scenarioId: string | null;
  outcome: ProjectionOutcome;
}

/**
 * Owns the widget state (baseline, parameters, selected scenario) and re-runs the engine once per change.
 * The engine only ever receives frozen copies of the current inputs.
 */
export class ProjectionController {
  private engine = createProjectionEngine();
  private config: ProjectionConfig;
  private baseline: Readonly<BaselinePremium>;
  private params: Readonly<ProjectionParameters>;
  private scenarioId: string | null = null;
  private outcome: ProjectionOutcome;
  private runs = 0;

  constructor(
    config: ProjectionConfig = baseConfig,
    baseline: BaselinePremium = defaultBaseline,
    params: ProjectionParameters = defaultParameters
  ) {
    this.config = config;
    this.baseline = Object.freeze({ ...baseline });
    this.params = Object.freeze({ ...params });
    this.outcome = this.recompute();
  }

  get runCount(): number {
    return this.runs;
  }

  snapshot(): ControllerSnapshot {
    return { baseline: this.baseline, params: this.params, scenarioId: this.scenarioId, outcome: this.outcome };
  }

  setConfig(config: ProjectionConfig): ProjectionOutcome {
    this.config = config;
    return (this.outcome = this.recompute());
  }

  setBaseline(key: BaselineKey, value: number): ProjectionOutcome {
    const field = baselineFields.find((f) => f.key === key);
    const next = field ? clampToField(field, value) : value;
    this.baseline = Object.freeze({ ...this.baseline, [key]: next });
    return (this.outcome = this.recompute());
  }

  setParameter(key: ProjectionParameterKey, value: number): ProjectionOutcome {
    const field = parameterFields.find((f) => f.key === key);
    const next = field ? clampToField(field, value) : value;
    this.params = Object.freeze({ ...this.params, [key]: next });
    // A manual edit no longer matches the preset.
    this.scenarioId = null;
    return (this.outcome = this.recompute());
  }

  selectScenario(scenarioId: string | null): ProjectionOutcome {
    this.scenarioId = scenarioId;
    this.params = Object.freeze(applyScenarioParameters(defaultParameters, scenarioId));
    return (this.outcome = this.recompute());
  }

  reset(): ProjectionOutcome {
    this.scenarioId = null;
    this.baseline = Object.freeze({ ...defaultBaseline });
    this.params = Object.freeze({ ...defaultParameters });
    return (this.outcome = this.recompute());
  }

  private recompute(): ProjectionOutcome {
    this.runs += 1;
    try {
      const run = this.engine.run({ baseline: this.baseline, params: this.params, config: this.config });
      return { ok: true, run };
    } catch (err) {
      if (err instanceof InvalidParameterError) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }
}
