export * from './renderer';
export { composeSolution } from './solution/composer';
export { stripDelimiters } from './latex/delimiters';
export { applyTheme, type Theme, type ThemeColors } from './latex/theme';
export { lintLatex, MAX_LATEX_LENGTH, type LintReport, type LatexValidator } from './latex/lint';
