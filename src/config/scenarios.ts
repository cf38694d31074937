// Named parameter presets; each overrides a subset of the defaults
import type { ProjectionParameters } from '../domain/projection';
import { defaultParameters } from './baseConfig';

export interface Scenario {
  id: string;
  name: string;
  description: string;
  parameterOverrides: Partial<ProjectionParameters>;
}

export const scenarios: Scenario[] = [
  {
    id: 'baseline',
    name: 'Baseline',
    description: 'Default assumptions: moderate growth, 60% attritional losses and a light scenario haircut.',
    parameterOverrides: {},
  },
  {
    id: 'catastrophe-year',
    name: 'Catastrophe Year',
    description: 'Major catastrophe losses push the scenario haircut and attritional losses up for the whole horizon.',
    parameterOverrides: {
      attritionalLossRatio: 70,
      catastrophicImpact: 25,
      economicDownturnImpact: 5,
    },
  },
  {
    id: 'economic-downturn',
    name: 'Economic Downturn',
    description: 'Contracting GDP with higher churn and a heavy downturn impact; new business dries up.',
    parameterOverrides: {
      gdpGrowth: -3,
      inflationRate: 1,
      churnRate: 20,
      newBusinessRate: 2,
      economicDownturnImpact: 15,
    },
  },
  {
    id: 'digital-growth',
    name: 'Digital Growth',
    description: 'Technology-led distribution lifts new business and offsets a tighter regulatory stance.',
    parameterOverrides: {
      newBusinessRate: 15,
      churnRate: 6,
      regulatoryImpact: -2,
      techImpact: 8,
    },
  },
];

export const findScenario = (scenarioId: string | null | undefined): Scenario | undefined =>
  scenarios.find((s) => s.id === scenarioId);

export const applyScenarioParameters = (
  base: ProjectionParameters,
  scenarioId: string | null | undefined
): ProjectionParameters => {
  const scenario = findScenario(scenarioId);
  if (!scenario) return base;
  return { ...base, ...scenario.parameterOverrides };
};

export const getScenarioParameters = (scenarioId: string | null | undefined): ProjectionParameters =>
  applyScenarioParameters(defaultParameters, scenarioId);
