/**
 * Small helpers shared by the header extractor and the array parser.
 * These understand just enough C to read constant tables, nothing more.
 */

const INTEGER_PATTERN = /^([+-])?(0[xX][0-9a-fA-F]+|0[bB][01]+|0[0-7]*|[1-9][0-9]*)[uUlL]*$/;

/**
 * Replace // and block comments with spaces, keeping newlines so that
 * offsets and line numbers still match the original text.
 */
export function stripComments(text: string): string {
  let out = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    if (ch === '/' && next === '/') {
      while (i < text.length && text[i] !== '\n') {
        out += ' ';
        i++;
      }
    } else if (ch === '/' && next === '*') {
      out += '  ';
      i += 2;
      while (i < text.length && !(text[i] === '*' && text[i + 1] === '/')) {
        out += text[i] === '\n' ? '\n' : ' ';
        i++;
      }
      if (i < text.length) {
        out += '  ';
        i += 2;
      }
    } else if (ch === '"' || ch === "'") {
      // Copy string and char literals verbatim so "//" inside them survives
      out += ch;
      i++;
      while (i < text.length && text[i] !== ch && text[i] !== '\n') {
        if (text[i] === '\\' && i + 1 < text.length) {
          out += text[i];
          i++;
        }
        out += text[i];
        i++;
      }
      if (i < text.length && text[i] === ch) {
        out += ch;
        i++;
      }
    } else {
      out += ch;
      i++;
    }
  }

  return out;
}

/**
 * Parse a C integer literal: decimal, hex, binary or octal, optionally signed,
 * parenthesised or suffixed with U/L. Returns undefined for anything else.
 */
export function parseCInteger(text: string): number | undefined {
  let token = text.trim();
  while (token.startsWith('(') && token.endsWith(')')) {
    token = token.slice(1, -1).trim();
  }

  const match = token.match(INTEGER_PATTERN);
  if (!match) return undefined;

  const sign = match[1] === '-' ? -1 : 1;
  const digits = match[2];
  let value: number;

  if (/^0[xX]/.test(digits)) {
    value = parseInt(digits.slice(2), 16);
  } else if (/^0[bB]/.test(digits)) {
    value = parseInt(digits.slice(2), 2);
  } else if (digits.length > 1 && digits.startsWith('0')) {
    value = parseInt(digits.slice(1), 8);
  } else {
    value = parseInt(digits, 10);
  }

  if (value === 0) return 0;
  value *= sign;
  return Number.isSafeInteger(value) ? value : undefined;
}

/** 1-based line number of a character offset */
export function lineAt(text: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === '\n') line++;
  }
  return line;
}
