export type Theme = 'light' | 'dark';

export interface ThemeColors {
  background: string;
  foreground: string;
}

const THEMES: Record<Theme, ThemeColors> = {
  light: { background: 'white', foreground: 'black' },
  dark: { background: '#1e1e2e', foreground: '#cdd6f4' },
};

export function applyTheme(theme: Theme): ThemeColors {
  return THEMES[theme];
}
