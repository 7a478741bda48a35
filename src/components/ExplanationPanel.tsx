import { useMemo } from 'react';
import { parseExplanation } from '../explain/prompt';
import type { ExplanationResult } from '../explain/types';
import HighlightedCode from './HighlightedCode';

interface ExplanationPanelProps {
  explanation: ExplanationResult | null;
  loading?: boolean;
}

export default function ExplanationPanel({ explanation, loading }: ExplanationPanelProps) {
  const sections = useMemo(
    () => (explanation?.success ? parseExplanation(explanation.text) : null),
    [explanation],
  );

  if (loading) {
    return (
      <div className="explanation-panel explanation-loading" aria-busy="true">
        <h3>AI Explanation</h3>
        <p className="hint">Waiting for the explanation service...</p>
      </div>
    );
  }
  if (!explanation) return null;

  if (!explanation.success) {
    return (
      <div className="explanation-panel explanation-failed" role="alert">
        <h3>AI Explanation</h3>
        <p>{explanation.errorMessage}</p>
        <p className="hint">The static analysis above is still valid.</p>
      </div>
    );
  }

  return (
    <div className="explanation-panel">
      <h3>
        AI Explanation
        <span className="explanation-model">{explanation.modelUsed}</span>
      </h3>
      {sections?.explanation && <div className="explanation-text">{sections.explanation}</div>}
      {sections?.suggestedFix && (
        <>
          <h4>Suggested Fix</h4>
          <HighlightedCode source={sections.suggestedFix} />
        </>
      )}
      {sections?.tips && (
        <>
          <h4>Tips</h4>
          <div className="explanation-text">{sections.tips}</div>
        </>
      )}
    </div>
  );
}
