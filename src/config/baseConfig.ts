import type { ProjectionConfig } from '../domain/config';
import type { BaselinePremium, ProjectionParameters } from '../domain/projection';

export const defaultBaseline: BaselinePremium = {
  life: 100,
  nonLife: 200,
};

export const defaultParameters: ProjectionParameters = {
  gdpGrowth: 3,
  inflationRate: 2,
  historicalTrendFactor: 2,
  attritionalLossRatio: 60,
  expenseRatio: 10,
  churnRate: 10,
  newBusinessRate: 5,
  catastrophicImpact: 5,
  economicDownturnImpact: 3,
  regulatoryImpact: 1,
  techImpact: 2,
};

export const baseConfig: ProjectionConfig = {
  version: 'v1',
  displayDecimals: 2,
  validation: 'none',
};
