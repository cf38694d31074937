import { ParameterGroup } from '../domain/enums';
import type { BaselineKey, ProjectionParameterKey } from '../domain/projection';
import { defaultBaseline, defaultParameters } from './baseConfig';

interface FieldBase {
  label: string;
  group: ParameterGroup;
  min: number;
  max?: number;
  step: number;
  defaultValue: number;
  helper?: string;
}

export interface BaselineField extends FieldBase {
  kind: 'baseline';
  key: BaselineKey;
}

export interface PercentField extends FieldBase {
  kind: 'percent';
  key: ProjectionParameterKey;
  max: number;
}

export type InputField = BaselineField | PercentField;

export const baselineFields: BaselineField[] = [
  {
    kind: 'baseline',
    key: 'life',
    label: 'Current (Year t) GWP - Life (in millions)',
    group: ParameterGroup.Baseline,
    min: 0,
    step: 10,
    defaultValue: defaultBaseline.life,
  },
  {
    kind: 'baseline',
    key: 'nonLife',
    label: 'Current (Year t) GWP - Non-Life (in millions)',
    group: ParameterGroup.Baseline,
    min: 0,
    step: 10,
    defaultValue: defaultBaseline.nonLife,
  },
];

const percent = (
  key: ProjectionParameterKey,
  label: string,
  group: ParameterGroup,
  min: number,
  max: number,
  step: number,
  helper?: string
): PercentField => ({ kind: 'percent', key, label, group, min, max, step, defaultValue: defaultParameters[key], helper });

export const parameterFields: PercentField[] = [
  percent('gdpGrowth', 'GDP Growth Rate (%)', ParameterGroup.Economic, -5, 10, 0.1),
  percent('inflationRate', 'Inflation Rate (%)', ParameterGroup.Economic, 0, 15, 0.1),
  percent('historicalTrendFactor', 'Historical Trend Factor (%)', ParameterGroup.Economic, -2, 10, 0.1),
  percent(
    'attritionalLossRatio',
    'Attritional Loss Ratio (%)',
    ParameterGroup.LossExpense,
    0,
    100,
    1,
    'Routine (non-catastrophic) claims as a share of premium.'
  ),
  percent('expenseRatio', 'Expense Ratio (%)', ParameterGroup.LossExpense, 0, 50, 1),
  percent(
    'churnRate',
    'Customer Churn Rate (%)',
    ParameterGroup.ChurnNewBusiness,
    0,
    50,
    1,
    'Share of existing policyholders not renewing.'
  ),
  percent('newBusinessRate', 'New Business Growth Rate (%)', ParameterGroup.ChurnNewBusiness, 0, 50, 1),
  percent('catastrophicImpact', 'Catastrophic Events Impact (%)', ParameterGroup.Scenario, 0, 50, 1),
  percent('economicDownturnImpact', 'Economic Downturn Impact (%)', ParameterGroup.Scenario, 0, 50, 1),
  percent('regulatoryImpact', 'Regulatory Changes Impact (%)', ParameterGroup.RegulatoryTech, -10, 10, 0.5),
  percent('techImpact', 'Technological Advancements Impact (%)', ParameterGroup.RegulatoryTech, -10, 10, 0.5),
];

export const GROUP_LABELS: Record<ParameterGroup, string> = {
  [ParameterGroup.Baseline]: 'Baseline GWP',
  [ParameterGroup.Economic]: 'Economic inputs',
  [ParameterGroup.LossExpense]: 'Attritional loss & expenses',
  [ParameterGroup.ChurnNewBusiness]: 'Churn & new business',
  [ParameterGroup.Scenario]: 'Scenario adjustments',
  [ParameterGroup.RegulatoryTech]: 'Regulatory & technological',
};

/**
 * Snap a collected value into the widget's range. Non-finite input falls back to the field default.
 */
export const clampToField = (field: InputField, value: number): number => {
  if (!Number.isFinite(value)) return field.defaultValue;
  const upper = field.max ?? Number.POSITIVE_INFINITY;
  return Math.max(field.min, Math.min(upper, value));
};
