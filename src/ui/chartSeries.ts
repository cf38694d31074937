import { BusinessLine } from '../domain/enums';
import type { ProjectionRecord } from '../domain/projection';
import type { ChartSeries } from '../types/series';
import { formatYearLabel } from '../utils/formatters';

export const SERIES_NAMES: Record<BusinessLine, string> = {
  [BusinessLine.Life]: 'GWP_Life',
  [BusinessLine.NonLife]: 'GWP_Non-Life',
};

const valueFor = (record: ProjectionRecord, line: BusinessLine): number =>
  line === BusinessLine.Life ? record.gwpLife : record.gwpNonLife;

// Long-form data for the chart: one series per line, one point per projection year.
export const buildChartSeries = (records: ProjectionRecord[]): ChartSeries[] =>
  [BusinessLine.Life, BusinessLine.NonLife].map((line) => ({
    line,
    name: SERIES_NAMES[line],
    points: records.map((record) => ({
      yearIndex: record.yearIndex,
      label: formatYearLabel(record.yearIndex),
      value: valueFor(record, line),
    })),
  }));

export const formatTooltip = (label: string, seriesName: string, value: number): string =>
  `${label} · ${seriesName}: ${value.toFixed(2)}`;
