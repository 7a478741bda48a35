import type { Finding } from '../analyzer/types';
import { SEVERITY_ICONS, SEVERITY_LABELS } from './severity';

interface FindingsPanelProps {
  findings: readonly Finding[];
  onFindingClick?: (line: number) => void;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

export default function FindingsPanel({ findings, onFindingClick }: FindingsPanelProps) {
  if (findings.length === 0) return null;

  const warnings = findings.filter((f) => f.severity === 'warning').length;
  const infos = findings.filter((f) => f.severity === 'info').length;
  const errors = findings.length - warnings - infos;

  return (
    <div className="findings-panel">
      <div className="findings-header">
        <h3>
          Static Analysis
          <span className="findings-count">{plural(findings.length, 'finding')}</span>
        </h3>
        <div className="findings-summary">
          {errors > 0 && <span className="badge badge-error">{plural(errors, 'error')}</span>}
          {warnings > 0 && <span className="badge badge-warning">{plural(warnings, 'warning')}</span>}
          {infos > 0 && <span className="badge badge-info">{plural(infos, 'note')}</span>}
        </div>
      </div>

      <ol className="findings-list">
        {findings.map((f) => {
          const jump = onFindingClick ? () => onFindingClick(f.line) : undefined;
          return (
            <li
              key={`${f.ruleId}:${f.line}:${f.message}`}
              className={`finding-card finding-${f.severity}${jump ? ' finding-clickable' : ''}`}
              onClick={jump}
              role={jump ? 'button' : undefined}
              tabIndex={jump ? 0 : undefined}
              onKeyDown={
                jump
                  ? (e) => {
                      if (e.key === 'Enter' || e.key === ' ') jump();
                    }
                  : undefined
              }
            >
              <div className="finding-card-header">
                <span className={`finding-icon finding-icon-${f.severity}`}>{SEVERITY_ICONS[f.severity]}</span>
                <span className="finding-line">Line {f.line}</span>
                <span className="finding-title">{f.title}</span>
                <span className={`finding-severity-badge severity-${f.severity}`}>{SEVERITY_LABELS[f.severity]}</span>
                <code className="finding-rule">{f.ruleId}</code>
              </div>
              <p className="finding-message">{f.message}</p>
              <div className="finding-suggestion">
                <strong>Suggestion:</strong> {f.suggestion}
              </div>
            </li>
          );
        })}
      </ol>
    </div>
  );
}
