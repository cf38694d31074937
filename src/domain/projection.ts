/** Baseline (year t) GWP per line, in millions. */
export interface BaselinePremium {
  life: number;
  nonLife: number;
}

/**
 * Percentage inputs on the 0..100 scale (3 means 3%).
 * Macro, trend, regulatory and tech inputs may be negative.
 */
export interface ProjectionParameters {
  gdpGrowth: number;
  inflationRate: number;
  historicalTrendFactor: number;
  attritionalLossRatio: number;
  expenseRatio: number;
  churnRate: number;
  newBusinessRate: number;
  catastrophicImpact: number;
  economicDownturnImpact: number;
  regulatoryImpact: number;
  techImpact: number;
}

export type ProjectionParameterKey = keyof ProjectionParameters;

export type BaselineKey = keyof BaselinePremium;

export interface ProjectionRecord {
  yearIndex: number;
  gwpLife: number;
  gwpNonLife: number;
}

// Multipliers applied each year; constant for a single projection call.
export interface ProjectionFactors {
  macroGrowth: number;
  trendGrowth: number;
  lossExpense: number;
  netBusiness: number;
  scenario: number;
  regulatoryTech: number;
}

export interface LineStages {
  opening: number;
  afterGrowth: number;
  afterLossExpense: number;
  afterNetBusiness: number;
  afterScenario: number;
  closing: number;
}

export interface ProjectionStep {
  yearIndex: number;
  life: LineStages;
  nonLife: LineStages;
}
