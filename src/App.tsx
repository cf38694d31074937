import { useEffect, useMemo, useState } from 'react';
import { baseConfig } from './config/baseConfig';
import { scenarios } from './config/scenarios';
import type { ValidationMode } from './domain/config';
import type { BaselineKey, ProjectionParameterKey } from './domain/projection';
import ParameterPanel from './components/ParameterPanel';
import ScenarioSelector from './components/ScenarioSelector';
import ProjectionTable from './components/ProjectionTable';
import ProjectionChart from './components/ProjectionChart';
import FactorsPanel from './components/FactorsPanel';
import EventLog from './components/EventLog';
import Disclaimer from './components/Disclaimer';
import { ProjectionController } from './ui/projectionController';
import type { ControllerSnapshot } from './ui/projectionController';
import { buildChartSeries } from './ui/chartSeries';
import { formatChange, formatMillions, pctChange } from './utils/formatters';

const controller = new ProjectionController(baseConfig);

const App = () => {
  const [theme, setTheme] = useState<'light' | 'dark'>('light');
  const [snapshot, setSnapshot] = useState<ControllerSnapshot>(() => controller.snapshot());
  const [validation, setValidation] = useState<ValidationMode>(baseConfig.validation);
  const { baseline, params, scenarioId, outcome } = snapshot;

  useEffect(() => {
    document.documentElement.setAttribute('data-theme', theme);
  }, [theme]);

  const refresh = () => setSnapshot(controller.snapshot());

  const handleBaselineChange = (key: BaselineKey, value: number) => {
    controller.setBaseline(key, value);
    refresh();
  };

  const handleParameterChange = (key: ProjectionParameterKey, value: number) => {
    controller.setParameter(key, value);
    refresh();
  };

  const handleSelectScenario = (id: string) => {
    controller.selectScenario(id);
    refresh();
  };

  const handleReset = () => {
    controller.reset();
    refresh();
  };

  const handleToggleValidation = () => {
    const next: ValidationMode = validation === 'strict' ? 'none' : 'strict';
    setValidation(next);
    controller.setConfig({ ...baseConfig, validation: next });
    refresh();
  };

  const series = useMemo(() => (outcome.ok ? buildChartSeries(outcome.run.records) : []), [outcome]);
  const lastRecord = outcome.ok ? outcome.run.records[outcome.run.records.length - 1] : undefined;

  return (
    <div className="app-shell">
      <header className="hero">
        <div className="hero-content">
          <div className="eyebrow">GWP projection lab</div>
          <h1>GWP Projection Methodology Tool</h1>
          <p className="muted">
            Projects Gross Written Premium for Life and Non-Life lines over a 5-year horizon from a baseline and a set
            of economic, underwriting, scenario and regulatory assumptions.
          </p>
          <div className="hero-pills">
            <span className="pill">Life t {formatMillions(baseline.life)}</span>
            <span className="pill">Non-Life t {formatMillions(baseline.nonLife)}</span>
            {lastRecord && (
              <>
                <span className="pill">Life t+5 {formatChange(pctChange(baseline.life, lastRecord.gwpLife))}</span>
                <span className="pill">
                  Non-Life t+5 {formatChange(pctChange(baseline.nonLife, lastRecord.gwpNonLife))}
                </span>
              </>
            )}
            <span className="pill warning">{scenarioId ? `Scenario: ${scenarioId}` : 'Custom inputs'}</span>
          </div>
        </div>
        <div className="hero-side">
          <button
            className="button ghost"
            type="button"
            onClick={() => setTheme((t) => (t === 'light' ? 'dark' : 'light'))}
          >
            {theme === 'light' ? 'Dark' : 'Light'} theme
          </button>
          <label className="muted" style={{ fontSize: 12 }}>
            <input
              type="checkbox"
              checked={validation === 'strict'}
              onChange={handleToggleValidation}
            />{' '}
            Reject out-of-domain inputs
          </label>
        </div>
      </header>

      <div className="layout-sidebar">
        <ParameterPanel
          baseline={baseline}
          params={params}
          onBaselineChange={handleBaselineChange}
          onParameterChange={handleParameterChange}
        />
        <main className="stack">
          <ScenarioSelector
            scenarios={scenarios}
            selectedId={scenarioId}
            onSelect={handleSelectScenario}
            onReset={handleReset}
          />
          {outcome.ok ? (
            <>
              <FactorsPanel factors={outcome.run.factors} />
              <ProjectionTable records={outcome.run.records} />
              <ProjectionChart series={series} />
              <EventLog events={outcome.run.events} />
            </>
          ) : (
            <div className="alert danger">
              <strong>Inputs rejected</strong>
              <ul>
                {outcome.error.issues.map((issue) => (
                  <li key={issue.field}>
                    {issue.field} = {issue.value} (expected {issue.domain})
                  </li>
                ))}
              </ul>
            </div>
          )}
          <Disclaimer />
        </main>
      </div>
    </div>
  );
};

export default App;
