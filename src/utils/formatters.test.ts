import { describe, expect, it } from 'vitest';
import {
  formatAxisValue,
  formatChange,
  formatFactor,
  formatMillions,
  formatPct,
  formatYearLabel,
  pctChange,
  roundTo,
} from './formatters';

describe('formatters', () => {
  it('rounds for display without producing negative zero', () => {
    expect(roundTo(34.71562190880001)).toBe(34.72);
    expect(roundTo(0.5042254345054431)).toBe(0.5);
    expect(Object.is(roundTo(-0.001), 0)).toBe(true);
    expect(roundTo(Number.POSITIVE_INFINITY)).toBe(Number.POSITIVE_INFINITY);
  });

  it('rounds exact ties half to even', () => {
    expect(roundTo(1.125)).toBe(1.12);
    expect(roundTo(0.125)).toBe(0.12);
    expect(roundTo(-0.375)).toBe(-0.38);
    expect(roundTo(2.5, 0)).toBe(2);
    expect(roundTo(-2.5, 0)).toBe(-2);
    expect(Object.is(roundTo(-0.5, 0), 0)).toBe(true);
  });

  it('rounds near-ties by the stored value', () => {
    expect(roundTo(2.675)).toBe(2.67);
    expect(roundTo(0.005)).toBe(0.01);
  });

  it('labels years relative to t', () => {
    expect(formatYearLabel(1)).toBe('t+1');
    expect(formatYearLabel(5)).toBe('t+5');
  });

  it('formats values and falls back on non-finite input', () => {
    expect(formatMillions(34.7156)).toBe('34.72m');
    expect(formatMillions(Number.NaN)).toBe('N/A');
    expect(formatPct(3)).toBe('3.0%');
    expect(formatPct(Number.POSITIVE_INFINITY, 1, '—')).toBe('—');
    expect(formatFactor(1.071)).toBe('1.0710x');
  });

  it('formats signed percentage changes', () => {
    expect(formatChange(-99.5)).toBe('-99.5%');
    expect(formatChange(150)).toBe('+150%');
    expect(formatChange(null)).toBe('—');
    expect(pctChange(0, 5)).toBeNull();
    expect(pctChange(100, 34.72)).toBeCloseTo(-65.28, 10);
  });

  it('scales chart axis values held in millions', () => {
    expect(formatAxisValue(1500)).toBe('1.5bn');
    expect(formatAxisValue(250)).toBe('250m');
    expect(formatAxisValue(4.18)).toBe('4.2m');
    expect(formatAxisValue(0.5)).toBe('0.50m');
    expect(formatAxisValue(Number.NaN)).toBe('');
  });
});
