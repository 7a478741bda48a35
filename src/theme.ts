export type ThemeMode = 'system' | 'dark' | 'light';
export type ResolvedTheme = 'dark' | 'light';

const STORAGE_KEY = 'python-debug-assistant-theme';

export function getStoredTheme(): ThemeMode {
  try {
    const stored = localStorage.getItem(STORAGE_KEY);
    if (stored === 'dark' || stored === 'light' || stored === 'system') return stored;
    return 'system';
  } catch {
    // storage blocked (private mode, sandboxed iframe)
    return 'system';
  }
}

export function storeTheme(mode: ThemeMode) {
  try {
    localStorage.setItem(STORAGE_KEY, mode);
  } catch (error) {
    console.warn('Could not persist theme preference:', error);
  }
}

export function resolveTheme(mode: ThemeMode): ResolvedTheme {
  if (mode === 'dark' || mode === 'light') return mode;
  return window.matchMedia('(prefers-color-scheme: light)').matches ? 'light' : 'dark';
}

export function applyTheme(resolved: ResolvedTheme) {
  document.documentElement.setAttribute('data-theme', resolved);
}

// --- Copy per theme ---

export interface ThemeCopy {
  title: string;
  subtitle: string;
  analyzeButton: string;
  analyzingButton: string;
  cleanTitle: string;
  cleanMessage: string;
  footer: string;
  hoverHint: string;
  samplesLabel: string;
}

export const DARK_COPY: ThemeCopy = {
  title: 'Python Debug Assistant',
  subtitle: 'Late-night bug hunt? Paste the code and the traceback.',
  analyzeButton: 'Debug It',
  analyzingButton: 'Digging in...',
  cleanTitle: 'Nothing lurking',
  cleanMessage: 'Static analysis came back empty. Check the explanation for runtime issues.',
  footer: 'Parsing and static checks run in your browser. Only the explanation request goes to the server.',
  hoverHint: 'Hover a marked line to see what was found there',
  samplesLabel: 'Load a sample:',
};

export const LIGHT_COPY: ThemeCopy = {
  title: 'Python Debug Assistant',
  subtitle: 'Paste your code, add the error if you have one, and get an explanation.',
  analyzeButton: 'Analyze Code',
  analyzingButton: 'Analyzing...',
  cleanTitle: 'Looking good!',
  cleanMessage: 'No obvious issues found via static analysis.',
  footer: 'Parsing and static checks run in your browser. Only the explanation request goes to the server.',
  hoverHint: 'Hover a marked line for details',
  samplesLabel: 'Try a sample:',
};

export function getCopy(resolved: ResolvedTheme): ThemeCopy {
  return resolved === 'dark' ? DARK_COPY : LIGHT_COPY;
}
