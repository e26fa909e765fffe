import { describe, it, expect } from 'vitest';
import { stripDelimiters } from './delimiters';
import { applyTheme } from './theme';

describe('stripDelimiters', () => {
  it('removes display delimiters', () => {
    expect(stripDelimiters('$$x^2$$')).toBe('x^2');
  });

  it('removes inline delimiters and inner padding', () => {
    expect(stripDelimiters(' $ y = mx + b $ ')).toBe('y = mx + b');
  });

  it('leaves undelimited input trimmed but otherwise unchanged', () => {
    expect(stripDelimiters('  a+b=c  ')).toBe('a+b=c');
  });

  it('leaves bare dollar signs alone', () => {
    expect(stripDelimiters('$')).toBe('$');
    expect(stripDelimiters('$$')).toBe('$$');
  });

  it('keeps dollar signs that do not wrap the whole expression', () => {
    expect(stripDelimiters('$a$ + b')).toBe('$a$ + b');
  });
});

describe('applyTheme', () => {
  it('maps light to black on white', () => {
    expect(applyTheme('light')).toEqual({ background: 'white', foreground: 'black' });
  });

  it('maps dark to a light foreground on a dark background', () => {
    expect(applyTheme('dark')).toEqual({ background: '#1e1e2e', foreground: '#cdd6f4' });
  });
});
