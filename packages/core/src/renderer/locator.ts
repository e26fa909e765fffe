export const CODECOGS_BASE_URL = 'https://latex.codecogs.com/png.image';

export const DEFAULT_DPI = 200;
export const DEFAULT_COLOR = 'black';

export interface LocatorOptions {
  baseUrl?: string;
  background?: string;
}

/**
 * Build a CodeCogs request URL for a LaTeX expression.
 *
 * The renderer reads its style from inline directives, so the expression is
 * prefixed with `\dpi{N}\color{C}` (and `\bg{B}` when a background is given)
 * and the whole string is percent-encoded into the query.
 */
export function buildLocator(
  expression: string,
  dpi: number = DEFAULT_DPI,
  color: string = DEFAULT_COLOR,
  options: LocatorOptions = {}
): string {
  const baseUrl = options.baseUrl ?? CODECOGS_BASE_URL;
  const background = options.background ? `\\bg{${options.background}}` : '';
  const prefix = `\\dpi{${dpi}}\\color{${color}}${background}`;
  return `${baseUrl}?${encodeURIComponent(`${prefix} ${expression}`)}`;
}
