import { useState, useMemo, useCallback, useEffect, useRef } from 'react';
import { highlightLines } from '../analyzer/highlight';
import type { Finding } from '../analyzer/types';
import { SEVERITY_COLORS, groupByLine, worstSeverity } from './severity';

interface HighlightedCodeProps {
  source: string;
  findings?: readonly Finding[];
  /** Line to scroll to and pulse, e.g. after a click in the findings panel */
  focusedLine?: number | null;
  onFocusHandled?: () => void;
  /** Line with a syntax error, marked without a tooltip */
  errorLine?: number | null;
}

interface TooltipState {
  line: number;
  top: number;
  left: number;
}

export default function HighlightedCode({
  source,
  findings = [],
  focusedLine,
  onFocusHandled,
  errorLine,
}: HighlightedCodeProps) {
  const lines = useMemo(() => highlightLines(source), [source]);
  const byLine = useMemo(() => groupByLine(findings), [findings]);
  const [tooltip, setTooltip] = useState<TooltipState | null>(null);
  const lineRefs = useRef<Map<number, HTMLDivElement>>(new Map());

  const showTooltip = useCallback((line: number, el: HTMLElement) => {
    const rect = el.getBoundingClientRect();
    setTooltip({ line, top: rect.bottom + 6, left: rect.left + 48 });
  }, []);

  const hideTooltip = useCallback(() => setTooltip(null), []);

  useEffect(() => {
    if (focusedLine == null) return;
    const el = lineRefs.current.get(focusedLine);
    if (!el) {
      onFocusHandled?.();
      return;
    }
    el.scrollIntoView({ behavior: 'smooth', block: 'center' });
    el.classList.add('pulse');
    if (byLine.has(focusedLine)) showTooltip(focusedLine, el);
    const timer = setTimeout(() => {
      el.classList.remove('pulse');
      onFocusHandled?.();
    }, 1200);
    return () => clearTimeout(timer);
  }, [focusedLine, onFocusHandled, byLine, showTooltip]);

  if (!source) return null;

  const tooltipFindings = tooltip ? byLine.get(tooltip.line) ?? [] : [];

  return (
    <div className="highlighted-code-container">
      <pre className="highlighted-code">
        <code>
          {lines.map((tokens, i) => {
            const lineNo = i + 1;
            const lineFindings = byLine.get(lineNo);
            const color = lineFindings ? SEVERITY_COLORS[worstSeverity(lineFindings)] : undefined;
            const classes = ['code-line'];
            if (lineFindings) classes.push('code-line-flagged');
            if (lineNo === errorLine) classes.push('code-line-error');
            return (
              <div
                key={lineNo}
                ref={(el) => {
                  if (el) lineRefs.current.set(lineNo, el);
                  else lineRefs.current.delete(lineNo);
                }}
                className={classes.join(' ')}
                style={color ? { backgroundColor: `${color}1f`, borderLeftColor: color } : undefined}
                onMouseEnter={lineFindings ? (e) => showTooltip(lineNo, e.currentTarget) : undefined}
                onMouseLeave={lineFindings ? hideTooltip : undefined}
              >
                <span className="line-number">{lineNo}</span>
                <span className="line-text">
                  {tokens.length === 0
                    ? '\n'
                    : tokens.map((t, j) => (
                        <span key={j} className={t.className || undefined}>
                          {t.text}
                        </span>
                      ))}
                </span>
              </div>
            );
          })}
        </code>
      </pre>
      {tooltip && tooltipFindings.length > 0 && (
        <div
          className="code-tooltip"
          style={{
            position: 'fixed',
            top: tooltip.top,
            left: tooltip.left,
            borderLeftColor: SEVERITY_COLORS[worstSeverity(tooltipFindings)],
          }}
          onMouseLeave={hideTooltip}
        >
          {tooltipFindings.map((f) => (
            <div key={`${f.ruleId}:${f.message}`} className="tooltip-entry">
              <span className="tooltip-title" style={{ color: SEVERITY_COLORS[f.severity] }}>
                {f.title}
              </span>
              <span className="tooltip-message">{f.message}</span>
              <span className="tooltip-suggestion">
                <strong>Fix:</strong> {f.suggestion}
              </span>
            </div>
          ))}
        </div>
      )}
    </div>
  );
}
