// Strip one surrounding $$...$$ or $...$ pair; callers are told not to send them, but often do.
export function stripDelimiters(latex: string): string {
  const trimmed = latex.trim();

  if (trimmed.length >= 4 && trimmed.startsWith('$$') && trimmed.endsWith('$$')) {
    return trimmed.slice(2, -2).trim();
  }
  if (trimmed.length > 2 && trimmed.startsWith('$') && trimmed.endsWith('$')) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed;
}
