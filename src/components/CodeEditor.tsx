import { useRef, useEffect } from 'react';
import type { KeyboardEvent } from 'react';

interface CodeEditorProps {
  value: string;
  onChange: (value: string) => void;
  placeholder?: string;
  /** Minimum height in pixels */
  minHeight?: number;
  indent?: string;
  ariaLabel?: string;
  /** Lets a `<label htmlFor>` point at the textarea */
  id?: string;
}

export default function CodeEditor({
  value,
  onChange,
  placeholder = 'Paste your Python code here...',
  minHeight = 240,
  indent = '    ',
  ariaLabel = 'Python source',
  id,
}: CodeEditorProps) {
  const textareaRef = useRef<HTMLTextAreaElement>(null);

  useEffect(() => {
    const el = textareaRef.current;
    if (!el) return;
    el.style.height = 'auto';
    el.style.height = `${Math.max(minHeight, el.scrollHeight)}px`;
  }, [value, minHeight]);

  const handleKeyDown = (e: KeyboardEvent<HTMLTextAreaElement>) => {
    if (e.key !== 'Tab' || e.shiftKey || e.metaKey || e.ctrlKey) return;
    e.preventDefault();
    const el = e.currentTarget;
    const { selectionStart, selectionEnd } = el;
    onChange(value.slice(0, selectionStart) + indent + value.slice(selectionEnd));
    // the controlled value lands on the next render
    requestAnimationFrame(() => {
      el.selectionStart = el.selectionEnd = selectionStart + indent.length;
    });
  };

  return (
    <div className="code-editor">
      <textarea
        ref={textareaRef}
        id={id}
        className="code-textarea"
        value={value}
        onChange={(e) => onChange(e.target.value)}
        onKeyDown={handleKeyDown}
        placeholder={placeholder}
        aria-label={ariaLabel}
        style={{ minHeight }}
        spellCheck={false}
        autoComplete="off"
        autoCorrect="off"
        autoCapitalize="off"
      />
    </div>
  );
}
