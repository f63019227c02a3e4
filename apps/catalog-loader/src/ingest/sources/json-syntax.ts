/**
 * Locates the first JSON syntax error in a document.
 *
 * JSON.parse reports errors without a reliable position across Node releases,
 * so after a failed parse the text is re-scanned with this validator to find
 * the offending offset. It accepts exactly the grammar of RFC 8259.
 */

export type TextPosition = Readonly<{
  /** 1-based. */
  line: number;
  /** 1-based, in UTF-16 code units. */
  column: number;
}>;

class ScanFailure {
  constructor(readonly offset: number) {}
}

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);
const SIMPLE_ESCAPES = new Set(['"', '\\', '/', 'b', 'f', 'n', 'r', 't']);

/** Offset of the first syntax error, or null when `text` is one valid JSON value. */
export function findJsonSyntaxErrorOffset(text: string): number | null {
  let pos = 0;

  const fail = (offset: number): never => {
    throw new ScanFailure(offset);
  };

  const skipWhitespace = (): void => {
    while (pos < text.length && WHITESPACE.has(text.charAt(pos))) pos += 1;
  };

  const expectLiteral = (word: string): void => {
    for (let i = 0; i < word.length; i += 1) {
      if (text.charAt(pos + i) !== word.charAt(i)) fail(pos + i);
    }
    pos += word.length;
  };

  const digits = (): void => {
    const start = pos;
    while (pos < text.length && isDigit(text.charAt(pos))) pos += 1;
    if (pos === start) fail(pos);
  };

  const scanNumber = (): void => {
    if (text.charAt(pos) === '-') pos += 1;
    if (text.charAt(pos) === '0') {
      pos += 1;
    } else {
      digits();
    }
    if (text.charAt(pos) === '.') {
      pos += 1;
      digits();
    }
    const e = text.charAt(pos);
    if (e === 'e' || e === 'E') {
      pos += 1;
      const sign = text.charAt(pos);
      if (sign === '+' || sign === '-') pos += 1;
      digits();
    }
  };

  const scanString = (): void => {
    pos += 1; // opening quote
    for (;;) {
      if (pos >= text.length) fail(text.length);
      const ch = text.charAt(pos);
      if (ch === '"') {
        pos += 1;
        return;
      }
      if (ch === '\\') {
        const esc = text.charAt(pos + 1);
        if (SIMPLE_ESCAPES.has(esc)) {
          pos += 2;
          continue;
        }
        if (esc !== 'u') fail(pos + 1);
        for (let i = 2; i < 6; i += 1) {
          if (!/^[0-9a-fA-F]$/.test(text.charAt(pos + i))) fail(pos + i);
        }
        pos += 6;
        continue;
      }
      if (ch.charCodeAt(0) < 0x20) fail(pos);
      pos += 1;
    }
  };

  const scanContainer = (close: '}' | ']', member: () => void): void => {
    pos += 1; // opening bracket
    skipWhitespace();
    if (text.charAt(pos) === close) {
      pos += 1;
      return;
    }
    for (;;) {
      member();
      skipWhitespace();
      const ch = text.charAt(pos);
      if (ch === ',') {
        pos += 1;
        skipWhitespace();
        continue;
      }
      if (ch === close) {
        pos += 1;
        return;
      }
      fail(pos);
    }
  };

  const scanValue = (): void => {
    skipWhitespace();
    const ch = text.charAt(pos);
    switch (ch) {
      case '{':
        scanContainer('}', () => {
          if (text.charAt(pos) !== '"') fail(pos);
          scanString();
          skipWhitespace();
          if (text.charAt(pos) !== ':') fail(pos);
          pos += 1;
          scanValue();
        });
        return;
      case '[':
        scanContainer(']', scanValue);
        return;
      case '"':
        scanString();
        return;
      case 't':
        expectLiteral('true');
        return;
      case 'f':
        expectLiteral('false');
        return;
      case 'n':
        expectLiteral('null');
        return;
      default:
        if (ch === '-' || isDigit(ch)) {
          scanNumber();
          return;
        }
        fail(pos);
    }
  };

  try {
    scanValue();
    skipWhitespace();
    if (pos < text.length) fail(pos);
    return null;
  } catch (err) {
    if (err instanceof ScanFailure) return err.offset;
    throw err;
  }
}

export function offsetToPosition(text: string, offset: number): TextPosition {
  const bounded = Math.max(0, Math.min(offset, text.length));
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < bounded; i += 1) {
    if (text.charCodeAt(i) === 10) {
      line += 1;
      lineStart = i + 1;
    }
  }
  return { line, column: bounded - lineStart + 1 };
}

/** Position of the first syntax error, or null for valid JSON. */
export function locateJsonSyntaxError(text: string): TextPosition | null {
  const offset = findJsonSyntaxErrorOffset(text);
  return offset === null ? null : offsetToPosition(text, offset);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9' && ch.length === 1;
}
