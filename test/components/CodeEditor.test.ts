import { describe, it, expect } from 'vitest';
import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import CodeEditor from '../../src/components/CodeEditor';

describe('CodeEditor', () => {
  it('puts the id on the textarea so a label can target it', () => {
    const html = renderToStaticMarkup(
      createElement(CodeEditor, { id: 'error-message', value: '', onChange: () => {}, ariaLabel: 'Error message' }),
    );
    expect(html).toContain('<textarea id="error-message" class="code-textarea"');
  });

  it('leaves the id off when none is given', () => {
    const html = renderToStaticMarkup(createElement(CodeEditor, { value: 'x = 1', onChange: () => {} }));
    expect(html).not.toContain(' id=');
  });
});
