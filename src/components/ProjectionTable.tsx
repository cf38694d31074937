import type { ProjectionRecord } from '../domain/projection';
import { formatYearLabel } from '../utils/formatters';

interface Props {
  records: ProjectionRecord[];
}

const formatCell = (v: number) => (Number.isFinite(v) ? v.toFixed(2) : 'N/A');

const ProjectionTable = ({ records }: Props) => (
  <div className="card">
    <h3>Projection Results (5-Year Horizon)</h3>
    <table className="data-table">
      <thead>
        <tr>
          <th>Year</th>
          <th className="numeric">GWP_Life (millions)</th>
          <th className="numeric">GWP_Non-Life (millions)</th>
        </tr>
      </thead>
      <tbody>
        {records.map((r) => (
          <tr key={r.yearIndex}>
            <td>{formatYearLabel(r.yearIndex)}</td>
            <td className="numeric">{formatCell(r.gwpLife)}</td>
            <td className="numeric">{formatCell(r.gwpNonLife)}</td>
          </tr>
        ))}
      </tbody>
    </table>
  </div>
);

export default ProjectionTable;
