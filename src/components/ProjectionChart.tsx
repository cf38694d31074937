import { useMemo } from 'react';
import { Line } from 'react-chartjs-2';
import {
  CategoryScale,
  Chart as ChartJS,
  Legend,
  LinearScale,
  LineController,
  LineElement,
  PointElement,
  Tooltip,
} from 'chart.js';
import type { TooltipItem } from 'chart.js';
import { BusinessLine } from '../domain/enums';
import type { ChartSeries } from '../types/series';
import { formatTooltip } from '../ui/chartSeries';
import { formatAxisValue } from '../utils/formatters';

ChartJS.register(LineController, CategoryScale, LinearScale, PointElement, LineElement, Tooltip, Legend);

type Props = {
  series: ChartSeries[];
  yLabel?: string;
};

type ChartColors = Record<BusinessLine, string> & {
  border: string;
  borderStrong: string;
  dim: string;
};

const readCssVar = (name: string, fallback: string): string => {
  if (typeof window === 'undefined') return fallback;
  const value = getComputedStyle(document.documentElement).getPropertyValue(name).trim();
  return value || fallback;
};

const useChartColors = (): ChartColors =>
  useMemo(
    () => ({
      [BusinessLine.Life]: readCssVar('--accent', '#007fa6'),
      [BusinessLine.NonLife]: readCssVar('--accent-alt', '#d9822b'),
      border: readCssVar('--border', '#d6d6d6'),
      borderStrong: readCssVar('--border-strong', '#bdbdbd'),
      dim: readCssVar('--dim', '#6b6b6b'),
    }),
    []
  );

const ProjectionChart = ({ series, yLabel = 'GWP (millions)' }: Props) => {
  const colors = useChartColors();
  const labels = useMemo(() => series[0]?.points.map((p) => p.label) ?? [], [series]);

  const chartData = useMemo(
    () => ({
      labels,
      datasets: series.map((s) => ({
        label: s.name,
        data: s.points.map((p) => p.value),
        borderColor: colors[s.line],
        backgroundColor: colors[s.line],
        borderWidth: 2,
        pointRadius: 3,
        pointHoverRadius: 5,
        pointHitRadius: 10,
        tension: 0,
      })),
    }),
    [colors, labels, series]
  );

  const options = useMemo(
    () => ({
      responsive: true,
      maintainAspectRatio: false,
      animation: false as const,
      interaction: { mode: 'nearest' as const, intersect: false },
      plugins: {
        legend: { display: true, position: 'bottom' as const },
        tooltip: {
          callbacks: {
            title: () => '',
            label: (context: TooltipItem<'line'>) => {
              const y = context.parsed.y;
              return typeof y === 'number' ? formatTooltip(context.label, context.dataset.label ?? '', y) : '';
            },
          },
        },
      },
      scales: {
        x: {
          type: 'category' as const,
          title: { display: true, text: 'Year', color: colors.dim, font: { size: 10 } },
          grid: { color: colors.border },
          border: { color: colors.borderStrong },
          ticks: { color: colors.dim },
        },
        y: {
          title: { display: true, text: yLabel, color: colors.dim, font: { size: 10 } },
          grid: { color: colors.border },
          border: { color: colors.borderStrong },
          ticks: {
            color: colors.dim,
            maxTicksLimit: 6,
            callback: (value: string | number) => formatAxisValue(Number(value)),
          },
        },
      },
    }),
    [colors, yLabel]
  );

  if (!labels.length) {
    return (
      <div className="series-chart empty">
        <div className="muted">No projection to plot.</div>
      </div>
    );
  }

  return (
    <div className="card">
      <h3>Projected GWP over 5 Years</h3>
      <div className="series-chart">
        <div className="series-canvas">
          <Line data={chartData} options={options} />
        </div>
      </div>
    </div>
  );
};

export default ProjectionChart;
