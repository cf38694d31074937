import type { ProjectionEvent } from '../engine/projection';

interface Props {
  events: ProjectionEvent[];
}

const EventLog = ({ events }: Props) => {
  return (
    <div className="card stack">
      <h3>Projection Notes</h3>
      {events.length === 0 ? (
        <div className="muted">No warnings for these inputs.</div>
      ) : (
        <ul className="event-log">
          {events.map((e) => (
            <li key={e.id} className={`event ${e.severity}`}>
              [{e.severity.toUpperCase()}] {e.message}
            </li>
          ))}
        </ul>
      )}
    </div>
  );
};

export default EventLog;
