import { FIRMWARE } from '../../constants/index.js';
import type { FilterBandElement, IntegerToken } from '../../types/index.js';
import { ArrayLiteralNotFoundError, MalformedArrayElementError } from './errors.js';
import { lineAt, parseCInteger, stripComments } from './c-text.js';

const INT = String.raw`[+-]?(?:0[xX][0-9a-fA-F]+|\d+)[uUlL]*`;
const IDENT = String.raw`[A-Za-z_]\w*`;
const SEP = String.raw`\s*,\s*`;

// { {ulLo, ulHi}, {dlLo, dlHi}, DIR, id, BAND, protocolBand, slot, inGroup, extra, CAL }
const ELEMENT_PATTERN = new RegExp(
  String.raw`^\{\s*` +
    String.raw`\{\s*(${INT})${SEP}(${INT})\s*\}${SEP}` +
    String.raw`\{\s*(${INT})${SEP}(${INT})\s*\}${SEP}` +
    `(${IDENT})${SEP}` +
    `(${INT})${SEP}` +
    `(${IDENT})${SEP}` +
    `(${INT})${SEP}` +
    `(${INT})${SEP}` +
    `(${INT})${SEP}` +
    `(${INT}|${IDENT})${SEP}` +
    `(${IDENT})` +
    String.raw`\s*,?\s*\}$`
);

const PREPROCESSOR_LINE = /^[ \t]*#.*$/gm;

export interface ArrayBody {
  /** Text between the outer braces, comments blanked out */
  body: string;
  /** Line of the first body character in the source file */
  firstLine: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Find `<name>[] = { ... };` and return its body. Braces are matched by
 * depth, so nested element braces and trailing comments do not end it early.
 */
export function locateArrayBody(sourceText: string, arrayName: string = FIRMWARE.ARRAY_NAME): ArrayBody {
  const text = stripComments(sourceText);
  const declaration = new RegExp(String.raw`\b${escapeRegExp(arrayName)}\s*\[[^\]]*\]\s*=\s*\{`);
  const match = declaration.exec(text);
  if (!match) {
    throw new ArrayLiteralNotFoundError(arrayName);
  }

  const start = match.index + match[0].length;
  let depth = 1;
  let i = start;
  for (; i < text.length && depth > 0; i++) {
    if (text[i] === '{') depth++;
    else if (text[i] === '}') depth--;
  }
  if (depth !== 0) {
    throw new ArrayLiteralNotFoundError(arrayName);
  }

  return {
    body: text.slice(start, i - 1),
    firstLine: lineAt(text, start),
  };
}

/**
 * Split an array body into top-level brace groups and decode each one.
 * Order is preserved; an empty body yields an empty list.
 */
export function parseArrayElements(body: string, firstLine: number = 1): FilterBandElement[] {
  const text = body.replace(PREPROCESSOR_LINE, (line) => ' '.repeat(line.length));
  const elements: FilterBandElement[] = [];

  let depth = 0;
  let groupStart = -1;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (ch === '{') {
      if (depth === 0) groupStart = i;
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth < 0) {
        throw new MalformedArrayElementError(elements.length, firstLine + lineAt(text, i) - 1, text.slice(i));
      }
      if (depth === 0) {
        const line = firstLine + lineAt(text, groupStart) - 1;
        elements.push(decodeElement(text.slice(groupStart, i + 1), elements.length, line));
      }
    } else if (depth === 0 && ch !== ',' && !/\s/.test(ch)) {
      const line = firstLine + lineAt(text, i) - 1;
      throw new MalformedArrayElementError(elements.length, line, text.slice(i, i + 80));
    }
  }

  if (depth !== 0) {
    const line = firstLine + lineAt(text, groupStart) - 1;
    throw new MalformedArrayElementError(elements.length, line, text.slice(groupStart));
  }

  return elements;
}

function decodeElement(group: string, index: number, line: number): FilterBandElement {
  const m = group.match(ELEMENT_PATTERN);
  if (!m) {
    throw new MalformedArrayElementError(index, line, group);
  }

  // The pattern admits forms C rejects, such as 08
  const int = (token: string): number => {
    const value = parseCInteger(token);
    if (value === undefined) {
      throw new MalformedArrayElementError(index, line, group);
    }
    return value;
  };

  const extra: IntegerToken = /^[A-Za-z_]/.test(m[11])
    ? { kind: 'named', name: m[11] }
    : { kind: 'literal', value: int(m[11]) };

  return {
    index,
    line,
    uplink: [int(m[1]), int(m[2])],
    downlink: [int(m[3]), int(m[4])],
    directionToken: m[5],
    legacyFilterId: int(m[6]),
    bandToken: m[7],
    protocolBandNumber: int(m[8]),
    filterSlot: int(m[9]),
    filtersInGroup: int(m[10]),
    extra,
    calibrationToken: m[12],
  };
}

export function parseFilterBandArray(sourceText: string, arrayName: string = FIRMWARE.ARRAY_NAME): FilterBandElement[] {
  const { body, firstLine } = locateArrayBody(sourceText, arrayName);
  return parseArrayElements(body, firstLine);
}
