import { roundTo } from '../utils/formatters';
import { PROJECTION_HORIZON_YEARS } from './projection';
import type { ProjectionRun } from './projection';

export function checkProjectionInvariants(run: ProjectionRun, displayDecimals = 2): string[] {
  const errors: string[] = [];

  if (run.records.length !== PROJECTION_HORIZON_YEARS) {
    errors.push(`Expected ${PROJECTION_HORIZON_YEARS} records, got ${run.records.length}`);
  }
  if (run.steps.length !== run.records.length) {
    errors.push(`Step trace has ${run.steps.length} entries for ${run.records.length} records`);
  }

  run.records.forEach((record, idx) => {
    if (record.yearIndex !== idx + 1) {
      errors.push(`Record ${idx} has year index ${record.yearIndex}`);
    }
  });

  run.steps.forEach((step, idx) => {
    const next = run.steps[idx + 1];
    if (next) {
      if (!Object.is(next.life.opening, step.life.closing)) {
        errors.push(`Life carry-forward broken between year ${step.yearIndex} and ${next.yearIndex}`);
      }
      if (!Object.is(next.nonLife.opening, step.nonLife.closing)) {
        errors.push(`Non-Life carry-forward broken between year ${step.yearIndex} and ${next.yearIndex}`);
      }
    }

    const record = run.records[idx];
    if (!record) return;
    if (!Object.is(record.gwpLife, roundTo(step.life.closing, displayDecimals))) {
      errors.push(`Year ${record.yearIndex} Life record ${record.gwpLife} does not match its unrounded closing`);
    }
    if (!Object.is(record.gwpNonLife, roundTo(step.nonLife.closing, displayDecimals))) {
      errors.push(`Year ${record.yearIndex} Non-Life record ${record.gwpNonLife} does not match its unrounded closing`);
    }
  });

  return errors;
}
