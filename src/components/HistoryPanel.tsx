import { summarizeReport } from '../report/report';
import type { Report } from '../report/report';

interface HistoryPanelProps {
  history: readonly Report[];
  selected: Report | null;
  onSelect: (report: Report) => void;
  onClear: () => void;
}

export default function HistoryPanel({ history, selected, onSelect, onClear }: HistoryPanelProps) {
  return (
    <div className="sidebar-panel history-panel">
      <h3>
        History
        {history.length > 0 && (
          <button type="button" className="link-btn" onClick={onClear}>
            Clear
          </button>
        )}
      </h3>
      {history.length === 0 ? (
        <p className="hint">Analyses from this session show up here.</p>
      ) : (
        <ul className="history-list">
          {[...history].reverse().map((report, i) => (
            <li key={`${report.timestamp}-${i}`}>
              <button
                type="button"
                className={report === selected ? 'history-item active' : 'history-item'}
                onClick={() => onSelect(report)}
              >
                <span className="history-time">{new Date(report.timestamp).toLocaleTimeString()}</span>
                <span className="history-summary">{summarizeReport(report)}</span>
              </button>
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}
