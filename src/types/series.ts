import { BusinessLine } from '../domain/enums';

export interface SeriesPoint {
  yearIndex: number;
  label: string;
  value: number;
}

export interface ChartSeries {
  line: BusinessLine;
  name: string;
  points: SeriesPoint[];
}
