import { baselineFields, GROUP_LABELS, parameterFields } from '../config/parameterFields';
import type { PercentField } from '../config/parameterFields';
import { ParameterGroup } from '../domain/enums';
import type { BaselineKey, BaselinePremium, ProjectionParameterKey, ProjectionParameters } from '../domain/projection';
import { formatPct } from '../utils/formatters';

interface Props {
  baseline: BaselinePremium;
  params: ProjectionParameters;
  onBaselineChange: (key: BaselineKey, value: number) => void;
  onParameterChange: (key: ProjectionParameterKey, value: number) => void;
}

const PERCENT_GROUPS: ParameterGroup[] = [
  ParameterGroup.Economic,
  ParameterGroup.LossExpense,
  ParameterGroup.ChurnNewBusiness,
  ParameterGroup.Scenario,
  ParameterGroup.RegulatoryTech,
];

const SliderField = ({
  field,
  value,
  onChange,
}: {
  field: PercentField;
  value: number;
  onChange: (value: number) => void;
}) => (
  <div className="field">
    <label htmlFor={field.key}>
      {field.label}
      <span className="muted align-right">{formatPct(value)}</span>
    </label>
    <input
      id={field.key}
      type="range"
      min={field.min}
      max={field.max}
      step={field.step}
      value={value}
      onChange={(e) => onChange(Number(e.target.value))}
    />
    {field.helper && <div className="metric-helper">{field.helper}</div>}
  </div>
);

const ParameterPanel = ({ baseline, params, onBaselineChange, onParameterChange }: Props) => (
  <aside className="card stack sidebar">
    <h3>Input Parameters</h3>
    <section className="stack">
      <div className="eyebrow">{GROUP_LABELS[ParameterGroup.Baseline]}</div>
      {baselineFields.map((field) => (
        <div className="field" key={field.key}>
          <label htmlFor={field.key}>{field.label}</label>
          <input
            id={field.key}
            type="number"
            min={field.min}
            step={field.step}
            value={baseline[field.key]}
            onChange={(e) => onBaselineChange(field.key, Number(e.target.value))}
          />
        </div>
      ))}
    </section>
    {PERCENT_GROUPS.map((group) => (
      <section className="stack" key={group}>
        <div className="eyebrow">{GROUP_LABELS[group]}</div>
        {parameterFields
          .filter((field) => field.group === group)
          .map((field) => (
            <SliderField
              key={field.key}
              field={field}
              value={params[field.key]}
              onChange={(value) => onParameterChange(field.key, value)}
            />
          ))}
      </section>
    ))}
  </aside>
);

export default ParameterPanel;
