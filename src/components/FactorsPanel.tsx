import type { ProjectionFactors } from '../domain/projection';
import { formatFactor } from '../utils/formatters';

interface Props {
  factors: ProjectionFactors;
}

const FactorsPanel = ({ factors }: Props) => {
  return (
    <div className="grid-metrics">
      <Metric
        label="Base growth"
        value={formatFactor(factors.macroGrowth * factors.trendGrowth)}
        helper="(1 + GDP + inflation) x (1 + historical trend)."
      />
      <Metric
        label="Loss & expense"
        value={formatFactor(factors.lossExpense)}
        helper="(1 - loss ratio) x (1 - expense ratio)."
      />
      <Metric
        label="Churn & new business"
        value={formatFactor(factors.netBusiness)}
        helper="Retention plus new business."
      />
      <Metric
        label="Scenario"
        value={formatFactor(factors.scenario)}
        helper="1 - (catastrophe + downturn), floored at 0."
      />
      <Metric
        label="Regulatory & tech"
        value={formatFactor(factors.regulatoryTech)}
        helper="(1 + regulatory) x (1 + technology)."
      />
    </div>
  );
};

const Metric = ({ label, value, helper }: { label: string; value: string; helper?: string }) => (
  <div className="metric-card">
    <div className="metric-label">{label}</div>
    <div className="metric-value">{value}</div>
    {helper && <div className="metric-helper">{helper}</div>}
  </div>
);

export default FactorsPanel;
