/**
 * Shared formatting utilities for displaying projection values.
 *
 * Non-finite values (NaN, Infinity) format as a fallback string.
 */

// toFixed(100) prints the stored binary value exactly for anything large enough to sit on a tie.
const isExactTie = (v: number, digits: number): boolean => {
  const [, fraction = ''] = Math.abs(v).toFixed(100).split('.');
  return fraction.charAt(digits) === '5' && /^0*$/.test(fraction.slice(digits + 1));
};

/**
 * Round to a fixed number of decimals, half to even on the stored value. Never returns -0.
 * Non-finite values pass through unchanged.
 * @param v - Value at full precision
 * @param digits - Number of decimal places
 */
export const roundTo = (v: number, digits = 2): number => {
  if (!Number.isFinite(v)) return v;
  let rounded = Number(v.toFixed(digits));
  // toFixed breaks exact ties away from zero; step back to the even neighbour.
  if (isExactTie(v, digits)) {
    const scale = 10 ** digits;
    const units = Math.round(Math.abs(rounded) * scale);
    if (units % 2 === 1) {
      rounded = (Math.sign(v) * (units - 1)) / scale;
    }
  }
  return rounded === 0 ? 0 : rounded;
};

/**
 * Label for a projection year relative to the baseline year t.
 * @param yearIndex - 1-based year offset (1 gives "t+1")
 */
export const formatYearLabel = (yearIndex: number): string => `t+${yearIndex}`;

/**
 * Format a premium amount already expressed in millions.
 * @param v - Value in millions (e.g., 34.72 for 34.72m)
 * @param digits - Number of decimal places
 * @param fallback - String to return if value is not finite
 */
export const formatMillions = (v: number, digits = 2, fallback = 'N/A'): string =>
  Number.isFinite(v) ? `${v.toFixed(digits)}m` : fallback;

/**
 * Format a percentage input.
 * @param v - Percentage on the 0..100 scale (e.g., 3 for 3%)
 * @param digits - Number of decimal places
 * @param fallback - String to return if value is not finite
 */
export const formatPct = (v: number, digits = 1, fallback = 'N/A'): string =>
  Number.isFinite(v) ? `${v.toFixed(digits)}%` : fallback;

/**
 * Format a percentage change value with +/- sign and dynamic precision.
 * Uses 0 decimals for large values (>=100), 1 decimal otherwise.
 * @param v - Percentage value (e.g., 5.5 for 5.5%)
 * @param fallback - String to return if value is not finite
 */
export const formatChange = (v: number | null, fallback = '—'): string => {
  if (v === null || !Number.isFinite(v)) return fallback;
  const fixed = Math.abs(v) >= 100 ? v.toFixed(0) : v.toFixed(1);
  return `${v > 0 ? '+' : ''}${fixed}%`;
};

/**
 * Percentage change from `before` to `after`, or null when `before` is zero.
 */
export const pctChange = (before: number, after: number): number | null => {
  if (before === 0) return null;
  return ((after - before) / Math.abs(before)) * 100;
};

/**
 * Format a yearly multiplier with 'x' suffix.
 * @param v - Multiplier value (e.g., 1.071 for 1.0710x)
 * @param digits - Number of decimal places
 * @param fallback - String to return if value is not finite
 */
export const formatFactor = (v: number, digits = 4, fallback = 'N/A'): string =>
  Number.isFinite(v) ? `${v.toFixed(digits)}x` : fallback;

/**
 * Format a value for chart axis display; values are in millions.
 * @param value - Value in millions
 */
export const formatAxisValue = (value: number): string => {
  if (!Number.isFinite(value)) return '';
  const abs = Math.abs(value);
  if (abs >= 1e3) return `${(value / 1e3).toFixed(abs >= 1e4 ? 0 : 1)}bn`;
  if (abs >= 1) return `${value.toFixed(abs >= 10 ? 0 : 1)}m`;
  return `${value.toFixed(2)}m`;
};
