import type { Finding, ParseError } from '../analyzer/types';
import type { ExplanationRequest, ExplanationSections } from './types';

/** A fence longer than any backtick run in `code`, so the code cannot close it. */
export function codeFence(code: string): string {
  let longest = 0;
  for (const run of code.match(/`+/g) ?? []) longest = Math.max(longest, run.length);
  return '`'.repeat(Math.max(3, longest + 1));
}

export function formatFindingsList(findings: readonly Finding[], omitted = 0): string {
  if (findings.length === 0 && omitted === 0) return 'None';
  const lines = findings.map((f, i) => `${i + 1}. Line ${f.line} [${f.ruleId}] ${f.message}`);
  if (omitted > 0) lines.push(`...and ${omitted} more`);
  return lines.join('\n');
}

export function formatParseError(error: ParseError): string {
  return `Line ${error.line}, column ${error.column}: ${error.message}`;
}

export function buildPrompt(request: ExplanationRequest): string {
  const fence = codeFence(request.source);
  const errorMessage = request.errorMessage?.trim() || 'N/A';
  const syntaxError = request.parseError ? formatParseError(request.parseError) : 'None';

  return `You are an expert Python debugging assistant. Analyze this code, the static analysis findings and any error message.
Provide:
1. Clear explanation of issues (in markdown)
2. Suggested fixes (as Python code blocks)
3. Any relevant tips

Code:
${fence}python
${request.source}
${fence}

Static analysis findings:
${formatFindingsList(request.findings, request.omittedFindings ?? 0)}

Syntax error:
${syntaxError}

Error message:
${errorMessage}

Format your response with clear sections:
### Explanation
[your explanation here]

### Suggested Fix
\`\`\`python
[fixed code here]
\`\`\`

### Tips
[any additional tips]
`;
}

/**
 * Split a model response into the sections the prompt asks for. A response
 * that ignores the format is kept whole as the explanation.
 */
export function parseExplanation(text: string): ExplanationSections {
  const sections: ExplanationSections = { explanation: '', suggestedFix: '', tips: '' };
  let matched = false;

  for (const part of text.split(/^###\s+/m)) {
    const newline = part.indexOf('\n');
    const heading = (newline === -1 ? part : part.slice(0, newline)).trim().toLowerCase();
    const body = newline === -1 ? '' : part.slice(newline + 1).trim();

    if (heading === 'explanation') {
      sections.explanation = body;
      matched = true;
    } else if (heading === 'suggested fix') {
      const block = /```[\w+-]*\n([\s\S]*?)```/.exec(body);
      sections.suggestedFix = (block ? block[1] : body).trim();
      matched = true;
    } else if (heading === 'tips') {
      sections.tips = body;
      matched = true;
    }
  }

  if (!matched) sections.explanation = text.trim();
  return sections;
}
