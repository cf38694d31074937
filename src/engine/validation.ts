import type { BaselineKey, BaselinePremium, ProjectionParameterKey, ProjectionParameters } from '../domain/projection';

export type ValidationField =
  | BaselineKey
  | ProjectionParameterKey
  | 'attritionalLossRatio+expenseRatio'
  | 'gdpGrowth+inflationRate';

export interface ValidationIssue {
  field: ValidationField;
  value: number;
  domain: string;
}

export class InvalidParameterError extends Error {
  readonly kind = 'InvalidParameter';
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(`Invalid projection input: ${issues.map((i) => `${i.field}=${i.value} (expected ${i.domain})`).join('; ')}`);
    this.name = 'InvalidParameterError';
    this.issues = issues;
  }
}

interface Rule {
  field: ValidationField;
  value: (baseline: BaselinePremium, params: ProjectionParameters) => number;
  min?: number;
  max?: number;
}

const between = (min?: number, max?: number): string => {
  if (min !== undefined && max !== undefined) return `${min}..${max}`;
  if (min !== undefined) return `>= ${min}`;
  if (max !== undefined) return `<= ${max}`;
  return 'a finite number';
};

const baselineRule = (key: BaselineKey): Rule => ({ field: key, value: (b) => b[key], min: 0 });

const paramRule = (key: ProjectionParameterKey, min?: number, max?: number): Rule => ({
  field: key,
  value: (_b, p) => p[key],
  min,
  max,
});

// Ratios are percentages; summed loss and expense may not consume more than the whole premium.
const rules: Rule[] = [
  baselineRule('life'),
  baselineRule('nonLife'),
  paramRule('gdpGrowth'),
  paramRule('inflationRate'),
  paramRule('historicalTrendFactor', -100),
  paramRule('attritionalLossRatio', 0, 100),
  paramRule('expenseRatio', 0, 100),
  paramRule('churnRate', 0, 100),
  paramRule('newBusinessRate', 0),
  paramRule('catastrophicImpact', 0),
  paramRule('economicDownturnImpact', 0),
  paramRule('regulatoryImpact', -100),
  paramRule('techImpact', -100),
  {
    field: 'attritionalLossRatio+expenseRatio',
    value: (_b, p) => p.attritionalLossRatio + p.expenseRatio,
    max: 100,
  },
  {
    field: 'gdpGrowth+inflationRate',
    value: (_b, p) => p.gdpGrowth + p.inflationRate,
    min: -100,
  },
];

export const validateProjectionInput = (
  baseline: BaselinePremium,
  params: ProjectionParameters
): ValidationIssue[] => {
  const issues: ValidationIssue[] = [];
  rules.forEach((rule) => {
    const value = rule.value(baseline, params);
    const outOfRange =
      !Number.isFinite(value) ||
      (rule.min !== undefined && value < rule.min) ||
      (rule.max !== undefined && value > rule.max);
    if (outOfRange) {
      issues.push({ field: rule.field, value, domain: between(rule.min, rule.max) });
    }
  });
  return issues;
};

export const assertValidProjectionInput = (baseline: BaselinePremium, params: ProjectionParameters): void => {
  const issues = validateProjectionInput(baseline, params);
  if (issues.length > 0) {
    throw new InvalidParameterError(issues);
  }
};
