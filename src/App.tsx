import { useState, useCallback, useEffect, useMemo, useRef } from 'react';
import type { KeyboardEvent } from 'react';
import { fetchServerInfo, requestExplanation } from './api/client';
import type { ServerInfo } from './api/schemas';
import { runAnalysis } from './pipeline';
import { appendToHistory, renderMarkdown, reportFileName } from './report/report';
import type { Report } from './report/report';
import { SAMPLES } from './samples';
import CodeEditor from './components/CodeEditor';
import HighlightedCode from './components/HighlightedCode';
import FindingsPanel from './components/FindingsPanel';
import ExplanationPanel from './components/ExplanationPanel';
import HistoryPanel from './components/HistoryPanel';
import LoginGate from './components/LoginGate';
import SettingsPanel from './components/SettingsPanel';
import ThemeToggle from './components/ThemeToggle';
import { getStoredTheme, storeTheme, resolveTheme, applyTheme, getCopy } from './theme';
import type { ThemeMode } from './theme';
import './App.css';

type Access = { state: 'checking' } | { state: 'locked' } | { state: 'open'; password: string | null };

function downloadReport(report: Report) {
  const blob = new Blob([renderMarkdown(report)], { type: 'text/markdown' });
  const url = window.URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = reportFileName(report);
  document.body.appendChild(a);
  a.click();
  window.URL.revokeObjectURL(url);
  document.body.removeChild(a);
}

function App() {
  const [serverInfo, setServerInfo] = useState<ServerInfo | null>(null);
  const [serverError, setServerError] = useState<string | null>(null);
  const [access, setAccess] = useState<Access>({ state: 'checking' });
  const [apiKey, setApiKey] = useState('');

  const [source, setSource] = useState('');
  const [errorMessage, setErrorMessage] = useState('');
  const [report, setReport] = useState<Report | null>(null);
  const [history, setHistory] = useState<readonly Report[]>([]);
  const [running, setRunning] = useState(false);
  const [focusedLine, setFocusedLine] = useState<number | null>(null);
  const inFlight = useRef<AbortController | null>(null);

  const [themeMode, setThemeMode] = useState<ThemeMode>(getStoredTheme);
  const resolved = useMemo(() => resolveTheme(themeMode), [themeMode]);
  const copy = useMemo(() => getCopy(resolved), [resolved]);

  useEffect(() => {
    applyTheme(resolved);
  }, [resolved]);

  // Follow OS changes while in system mode
  useEffect(() => {
    if (themeMode !== 'system') return;
    const mql = window.matchMedia('(prefers-color-scheme: light)');
    const handler = () => applyTheme(resolveTheme('system'));
    mql.addEventListener('change', handler);
    return () => mql.removeEventListener('change', handler);
  }, [themeMode]);

  useEffect(() => {
    let cancelled = false;
    fetchServerInfo()
      .then((info) => {
        if (cancelled) return;
        setServerInfo(info);
        setAccess(info.passwordRequired ? { state: 'locked' } : { state: 'open', password: null });
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        console.error('Failed to load server config:', err);
        setServerError(err instanceof Error ? err.message : 'Failed to reach the server');
        // still usable for local analysis
        setAccess({ state: 'open', password: null });
      });
    return () => {
      cancelled = true;
    };
  }, []);

  useEffect(() => () => inFlight.current?.abort(), []);

  const handleThemeChange = useCallback((mode: ThemeMode) => {
    setThemeMode(mode);
    storeTheme(mode);
  }, []);

  const password = access.state === 'open' ? access.password : null;

  const handleAnalyze = useCallback(() => {
    if (!source.trim() || running) return;
    inFlight.current?.abort();
    const controller = new AbortController();
    inFlight.current = controller;
    setRunning(true);
    setFocusedLine(null);

    runAnalysis(
      { source, errorMessage },
      (request, signal) =>
        requestExplanation(request, {
          password,
          apiKey: apiKey.trim() || null,
          model: serverInfo?.model ?? 'unknown',
          signal,
        }),
      { signal: controller.signal },
    )
      .then((next) => {
        if (controller.signal.aborted) return;
        setReport(next);
        setHistory((prev) => appendToHistory(prev, next));
      })
      .catch((err: unknown) => {
        console.error('Analysis failed:', err);
      })
      .finally(() => {
        if (inFlight.current === controller) {
          inFlight.current = null;
          setRunning(false);
        }
      });
  }, [source, errorMessage, running, password, apiKey, serverInfo]);

  const handleCancel = useCallback(() => {
    inFlight.current?.abort();
    inFlight.current = null;
    setRunning(false);
  }, []);

  const handleSample = useCallback((code: string) => {
    setSource(code);
    setErrorMessage('');
    setReport(null);
  }, []);

  const handleSelectHistory = useCallback((selected: Report) => {
    setReport(selected);
    setSource(selected.sourceText);
    setErrorMessage(selected.errorMessage ?? '');
    setFocusedLine(null);
  }, []);

  const handleLogout = useCallback(() => {
    inFlight.current?.abort();
    setAccess({ state: 'locked' });
    setReport(null);
    setHistory([]);
  }, []);

  const handleKeyDown = useCallback(
    (e: KeyboardEvent) => {
      if ((e.metaKey || e.ctrlKey) && e.key === 'Enter') {
        e.preventDefault();
        handleAnalyze();
      }
    },
    [handleAnalyze],
  );

  const clearFocus = useCallback(() => setFocusedLine(null), []);

  if (access.state === 'checking') {
    return <div className="app app-loading">Loading...</div>;
  }
  if (access.state === 'locked') {
    return <LoginGate title={copy.title} onAuthenticated={(pw) => setAccess({ state: 'open', password: pw })} />;
  }

  const hasFindings = report !== null && report.findings.length > 0;
  const isClean = report !== null && report.findings.length === 0 && !report.parseError;

  return (
    <div className="app" onKeyDown={handleKeyDown}>
      <header className="app-header">
        <div className="logo-area">
          <svg viewBox="0 0 32 32" width="32" height="32" className="logo-icon" aria-hidden="true">
            <circle cx="16" cy="16" r="14" fill="#3776ab" />
            <text x="16" y="21" textAnchor="middle" fontSize="13" fontWeight="bold" fill="#ffd43b">
              Py
            </text>
          </svg>
          <div>
            <h1>{copy.title}</h1>
            <p className="subtitle">{copy.subtitle}</p>
          </div>
        </div>
        <ThemeToggle mode={themeMode} onChange={handleThemeChange} />
      </header>

      {serverError && (
        <div className="server-warning" role="alert">
          {serverError}. Static analysis still works; explanations may not.
        </div>
      )}

      <div className="app-body">
        <main className="app-main">
          <section className="input-section">
            <div className="section-header">
              <h2>Python Code</h2>
              <span className="hint">Ctrl/Cmd + Enter to analyze</span>
            </div>
            <CodeEditor value={source} onChange={setSource} />
            <div className="samples-row">
              <span className="samples-label">{copy.samplesLabel}</span>
              {SAMPLES.map((sample) => (
                <button
                  key={sample.label}
                  type="button"
                  className="example-btn"
                  onClick={() => handleSample(sample.code)}
                >
                  {sample.label}
                </button>
              ))}
            </div>
            <label className="field-label" htmlFor="error-message">
              Error message or traceback (optional)
            </label>
            <CodeEditor
              id="error-message"
              value={errorMessage}
              onChange={setErrorMessage}
              minHeight={80}
              placeholder="Traceback (most recent call last): ..."
              ariaLabel="Error message"
            />
            <div className="action-row">
              <button type="button" className="analyze-btn" onClick={handleAnalyze} disabled={!source.trim() || running}>
                {running ? copy.analyzingButton : copy.analyzeButton}
              </button>
              {running && (
                <button type="button" className="link-btn" onClick={handleCancel}>
                  Cancel
                </button>
              )}
            </div>
          </section>

          {running && <ExplanationPanel explanation={null} loading />}

          {report && !running && (
            <section className="results-section">
              {report.parseError && (
                <div className="parse-warning" role="alert">
                  <strong>Syntax error:</strong> line {report.parseError.line}, column {report.parseError.column}:{' '}
                  {report.parseError.message}
                  <br />
                  <span className="parse-warning-sub">Static checks were skipped until the code parses.</span>
                </div>
              )}

              {isClean && (
                <div className="clean-result">
                  <span className="clean-icon">{'✓'}</span>
                  <div>
                    <strong>{copy.cleanTitle}</strong>
                    <p>{copy.cleanMessage}</p>
                  </div>
                </div>
              )}

              <div className="section-header">
                <h2>Submitted Code</h2>
                {hasFindings && <span className="hint">{copy.hoverHint}</span>}
              </div>
              <HighlightedCode
                source={report.sourceText}
                findings={report.findings}
                focusedLine={focusedLine}
                onFocusHandled={clearFocus}
                errorLine={report.parseError?.line ?? null}
              />
              <FindingsPanel findings={report.findings} onFindingClick={setFocusedLine} />
              <ExplanationPanel explanation={report.explanation} />

              <div className="action-row">
                <button type="button" className="download-btn" onClick={() => downloadReport(report)}>
                  Download report (.md)
                </button>
              </div>
            </section>
          )}
        </main>

        <aside className="app-sidebar">
          <SettingsPanel
            apiKey={apiKey}
            onApiKeyChange={setApiKey}
            serverInfo={serverInfo}
            onLogout={serverInfo?.passwordRequired ? handleLogout : undefined}
          />
          <HistoryPanel history={history} selected={report} onSelect={handleSelectHistory} onClear={() => setHistory([])} />
        </aside>
      </div>

      <footer className="app-footer">
        <p>{copy.footer}</p>
      </footer>
    </div>
  );
}

export default App;
