import type { ThemeMode } from '../theme';

interface ThemeToggleProps {
  mode: ThemeMode;
  onChange: (mode: ThemeMode) => void;
}

const THEME_OPTIONS: readonly { value: ThemeMode; label: string; icon: string }[] = [
  { value: 'light', label: 'Light theme', icon: '☀' },
  { value: 'system', label: 'Follow system theme', icon: '◐' },
  { value: 'dark', label: 'Dark theme', icon: '☾' },
];

export default function ThemeToggle({ mode, onChange }: ThemeToggleProps) {
  return (
    <div className="theme-toggle" role="radiogroup" aria-label="Color theme">
      {THEME_OPTIONS.map(({ value, label, icon }) => {
        const selected = mode === value;
        return (
          <button
            key={value}
            type="button"
            role="radio"
            aria-checked={selected}
            aria-label={label}
            title={label}
            className={selected ? 'theme-toggle-btn active' : 'theme-toggle-btn'}
            onClick={() => {
              if (!selected) onChange(value);
            }}
          >
            {icon}
          </button>
        );
      })}
    </div>
  );
}
