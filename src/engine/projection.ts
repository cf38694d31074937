/**
 * GWP projection engine.
 *
 * Projects Life and Non-Life gross written premium over a fixed five-year horizon. Each year runs the
 * same pipeline on both lines:
 * base growth -> loss & expense erosion -> churn & new business -> scenario haircut ->
 * regulatory & tech adjustment -> carry forward.
 *
 * The closing value of year j (full precision) is the opening value of year j+1. Rounding to
 * `displayDecimals` happens only when records are emitted.
 *
 * Both lines share one parameter set and differ only in their baseline.
 */
import { baseConfig } from '../config/baseConfig';
import type { ProjectionConfig } from '../domain/config';
import type {
  BaselinePremium,
  LineStages,
  ProjectionFactors,
  ProjectionParameters,
  ProjectionRecord,
  ProjectionStep,
} from '../domain/projection';
import { roundTo } from '../utils/formatters';
import { assertValidProjectionInput } from './validation';

export const PROJECTION_HORIZON_YEARS = 5;

// Used by the UI to explain anything unusual about a run.
export type EventSeverity = 'info' | 'warning' | 'error';

export interface ProjectionEvent {
  id: string;
  severity: EventSeverity;
  message: string;
  yearIndex?: number;
}

export interface ProjectionInput {
  baseline: BaselinePremium;
  params: ProjectionParameters;
  config?: ProjectionConfig;
}

export interface ProjectionRun {
  records: ProjectionRecord[];
  steps: ProjectionStep[];
  factors: ProjectionFactors;
  events: ProjectionEvent[];
}

export interface ProjectionEngine {
  run(input: ProjectionInput): ProjectionRun;
}

const pct = (value: number): number => value / 100;

/**
 * Converts the percentage inputs into the yearly multipliers.
 *
 * GDP and inflation add before compounding with trend; loss and expense ratios combine
 * multiplicatively; retention and new business add; the scenario multiplier is floored at zero.
 */
export const computeProjectionFactors = (params: ProjectionParameters): ProjectionFactors => {
  const gdp = pct(params.gdpGrowth);
  const inflation = pct(params.inflationRate);
  const trend = pct(params.historicalTrendFactor);
  const lossRatio = pct(params.attritionalLossRatio);
  const expenseRatio = pct(params.expenseRatio);
  const churn = pct(params.churnRate);
  const newBusiness = pct(params.newBusinessRate);
  const scenarioImpact = pct(params.catastrophicImpact) + pct(params.economicDownturnImpact);
  const regImpact = pct(params.regulatoryImpact);
  const techImpact = pct(params.techImpact);

  return {
    macroGrowth: 1 + gdp + inflation,
    trendGrowth: 1 + trend,
    lossExpense: (1 - lossRatio) * (1 - expenseRatio),
    netBusiness: 1 - churn + newBusiness,
    scenario: Math.max(0, 1 - scenarioImpact),
    regulatoryTech: (1 + regImpact) * (1 + techImpact),
  };
};

/** Runs one line through one year of the pipeline. */
export const applyProjectionFactors = (opening: number, factors: ProjectionFactors): LineStages => {
  const afterGrowth = opening * factors.macroGrowth * factors.trendGrowth;
  const afterLossExpense = afterGrowth * factors.lossExpense;
  const afterNetBusiness = afterLossExpense * factors.netBusiness;
  const afterScenario = afterNetBusiness * factors.scenario;
  const closing = afterScenario * factors.regulatoryTech;
  return { opening, afterGrowth, afterLossExpense, afterNetBusiness, afterScenario, closing };
};

const describeFactorEvents = (
  params: ProjectionParameters,
  factors: ProjectionFactors,
  push: (severity: EventSeverity, message: string, yearIndex?: number) => void
): void => {
  if (factors.scenario === 0) {
    const scenarioSum = params.catastrophicImpact + params.economicDownturnImpact;
    push(
      'warning',
      `Scenario impacts total ${scenarioSum}%; scenario multiplier floored at 0 so every projected year is 0`
    );
  }
  if (factors.lossExpense < 0) {
    push('warning', `Loss/expense multiplier is negative (${factors.lossExpense.toFixed(4)}); projected GWP changes sign`);
  }
  if (factors.netBusiness < 0) {
    push('warning', `Net business multiplier is negative (${factors.netBusiness.toFixed(4)}); projected GWP changes sign`);
  }
  if (factors.regulatoryTech < 0) {
    push(
      'warning',
      `Regulatory/tech multiplier is negative (${factors.regulatoryTech.toFixed(4)}); projected GWP changes sign`
    );
  }
  if (factors.macroGrowth <= 0) {
    push(
      'warning',
      `GDP plus inflation is ${params.gdpGrowth + params.inflationRate}%; base growth removes all premium or flips its sign`
    );
  }
  if (factors.trendGrowth <= 0) {
    push('warning', `Historical trend of ${params.historicalTrendFactor}% removes all premium or flips its sign`);
  }
};

export const createProjectionEngine = (): ProjectionEngine => {
  const run = (input: ProjectionInput): ProjectionRun => {
    const { baseline, params } = input;
    const config = input.config ?? baseConfig;
    if (config.validation === 'strict') {
      assertValidProjectionInput(baseline, params);
    }

    const events: ProjectionEvent[] = [];
    let eventSequence = 0;
    const push = (severity: EventSeverity, message: string, yearIndex?: number): void => {
      events.push({ id: `evt-${eventSequence++}`, severity, message, yearIndex });
    };

    const factors = computeProjectionFactors(params);
    describeFactorEvents(params, factors, push);

    const steps: ProjectionStep[] = [];
    const records: ProjectionRecord[] = [];
    let life = baseline.life;
    let nonLife = baseline.nonLife;

    for (let yearIndex = 1; yearIndex <= PROJECTION_HORIZON_YEARS; yearIndex += 1) {
      const lifeStages = applyProjectionFactors(life, factors);
      const nonLifeStages = applyProjectionFactors(nonLife, factors);
      steps.push({ yearIndex, life: lifeStages, nonLife: nonLifeStages });

      if (!Number.isFinite(lifeStages.closing) || !Number.isFinite(nonLifeStages.closing)) {
        push('error', `Projection overflowed to a non-finite value in year ${yearIndex}`, yearIndex);
      }

      // Full precision carries forward; only the emitted record is rounded.
      life = lifeStages.closing;
      nonLife = nonLifeStages.closing;
      records.push({
        yearIndex,
        gwpLife: roundTo(life, config.displayDecimals),
        gwpNonLife: roundTo(nonLife, config.displayDecimals),
      });
    }

    return { records, steps, factors, events };
  };

  return { run };
};

const defaultEngine = createProjectionEngine();

export const runProjection = (input: ProjectionInput): ProjectionRun => defaultEngine.run(input);

/** Five rounded yearly records for the given baseline and parameters. */
export const projectGwp = (
  baseline: BaselinePremium,
  params: ProjectionParameters,
  config: ProjectionConfig = baseConfig
): ProjectionRecord[] => runProjection({ baseline, params, config }).records;
