export const MAX_LATEX_LENGTH = 10_000;

const UNSUPPORTED_CONSTRUCTS = ['\\begin{tikzpicture}', '\\usepackage', '\\documentclass', '\\chemfig'];

export interface LintReport {
  valid: boolean;
  warnings: string[];
  errors: string[];
}

export type LatexValidator = (latex: string) => { valid: boolean; errors: string[] };

/**
 * Best-effort checks for input that will not render. Heuristic rules run first;
 * `validate`, when given, performs a dry-run conversion and contributes its errors.
 */
export function lintLatex(latex: string, validate?: LatexValidator): LintReport {
  if (latex.trim() === '') {
    return { valid: false, warnings: [], errors: ['Empty expression.'] };
  }

  const warnings: string[] = [];
  const errors: string[] = [];

  if (latex.length > MAX_LATEX_LENGTH) {
    errors.push(`Expression too long (${latex.length} chars, max ${MAX_LATEX_LENGTH}).`);
  }

  const dollarCount = latex.split('$').length - 1;
  if (dollarCount % 2 !== 0) {
    errors.push('Unbalanced $ delimiters: math must be wrapped in matching $ or $$.');
  }

  for (const construct of UNSUPPORTED_CONSTRUCTS) {
    if (latex.includes(construct)) {
      errors.push(`'${construct}' is not supported. Use standard math LaTeX only.`);
    }
  }

  if (latex.includes('\\frac') && !latex.includes('{')) {
    warnings.push('\\frac requires two arguments in braces: \\frac{numerator}{denominator}');
  }

  if (validate) {
    const result = validate(latex);
    errors.push(...result.errors.map((message) => `Render test failed: ${message}`));
  }

  return { valid: errors.length === 0, warnings, errors };
}
