import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { InputUnreadable, MalformedFile } from '../errors.js';
import { locateJsonSyntaxError, offsetToPosition, type TextPosition } from './json-syntax.js';

export type ProductFileFormat = 'array' | 'object' | 'ndjson';

export type RawProductRecord = Readonly<{
  /** 0-based ordinal within the file. */
  index: number;
  /** 1-based line for line-delimited input; null inside a JSON array. */
  line: number | null;
  value: unknown;
}>;

export type ProductFileContent = Readonly<{
  file: string;
  format: ProductFileFormat;
  /** Records that parsed before any syntax error. */
  records: readonly RawProductRecord[];
  syntaxError: MalformedFile | null;
}>;

export async function readProductFile(filePath: string): Promise<ProductFileContent> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    throw new InputUnreadable(path.basename(filePath), err);
  }
  return parseProductFileText(text, path.basename(filePath));
}

/**
 * Format detection:
 * 1. first non-whitespace character `[`: one JSON array, parsed whole;
 * 2. otherwise the whole text is tried as one JSON value (a lone object);
 * 3. if that fails and the first non-blank line is a value by itself, one
 *    JSON value per non-blank line; otherwise the error is located in the
 *    whole document.
 *
 * A syntax error stops the file. In line-delimited input the lines before it
 * are still returned.
 */
export function parseProductFileText(input: string, file: string): ProductFileContent {
  const text = input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;
  const firstIndex = text.search(/\S/);

  if (firstIndex === -1) {
    return { file, format: 'ndjson', records: [], syntaxError: null };
  }

  if (text.charAt(firstIndex) === '[') {
    return parseArrayDocument(text, file);
  }

  const whole = tryParse(text);
  if (whole.ok) {
    const line = offsetToPosition(text, firstIndex).line;
    return {
      file,
      format: 'object',
      records: [{ index: 0, line, value: whole.value }],
      syntaxError: null,
    };
  }

  // A first line that is not a value by itself means one multi-line document.
  const firstLineEnd = text.indexOf('\n', firstIndex);
  const firstLine = text.slice(firstIndex, firstLineEnd === -1 ? text.length : firstLineEnd);
  if (!tryParse(firstLine).ok) {
    return {
      file,
      format: 'object',
      records: [],
      syntaxError: malformedAt(file, text, whole.reason, null),
    };
  }

  return parseLineDelimited(text, file);
}

function parseArrayDocument(text: string, file: string): ProductFileContent {
  const parsed = tryParse(text);
  if (!parsed.ok) {
    return {
      file,
      format: 'array',
      records: [],
      syntaxError: malformedAt(file, text, parsed.reason, null),
    };
  }

  // A leading '[' that parses is always an array.
  const items: unknown[] = Array.isArray(parsed.value) ? parsed.value : [parsed.value];
  return {
    file,
    format: 'array',
    records: items.map((value, index) => ({ index, line: null, value })),
    syntaxError: null,
  };
}

function parseLineDelimited(text: string, file: string): ProductFileContent {
  const lines = text.split('\n');
  const records: RawProductRecord[] = [];

  for (let i = 0; i < lines.length; i += 1) {
    const raw = (lines[i] ?? '').replace(/\r$/, '');
    if (raw.trim() === '') continue;

    const parsed = tryParse(raw);
    if (!parsed.ok) {
      return {
        file,
        format: 'ndjson',
        records,
        syntaxError: malformedAt(file, raw, parsed.reason, i + 1),
      };
    }
    records.push({ index: records.length, line: i + 1, value: parsed.value });
  }

  return { file, format: 'ndjson', records, syntaxError: null };
}

type ParseAttempt = Readonly<{ ok: true; value: unknown }> | Readonly<{ ok: false; reason: string }>;

function tryParse(text: string): ParseAttempt {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    if (err instanceof SyntaxError) {
      return { ok: false, reason: err.message };
    }
    throw err;
  }
}

/**
 * `text` is either the whole document (lineNumber null) or a single line,
 * in which case the reported line is `lineNumber`.
 */
function malformedAt(
  file: string,
  text: string,
  reason: string,
  lineNumber: number | null
): MalformedFile {
  const position: TextPosition =
    locateJsonSyntaxError(text) ?? offsetToPosition(text, text.length);
  return new MalformedFile({
    file,
    line: lineNumber ?? position.line,
    column: position.column,
    reason,
  });
}
