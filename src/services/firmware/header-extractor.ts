import { ENUMS_OF_INTEREST, FIRMWARE, MACROS, MACROS_OF_INTEREST } from '../../constants/index.js';
import type { EnumMember, ExtractedEnums, ExtractedMacros, HeaderFacts } from '../../types/index.js';
import { parseCInteger, stripComments } from './c-text.js';

const ENUM_PATTERN = /typedef\s+enum\s*(?:[A-Za-z_]\w*\s*)?\{([^}]*)\}\s*([A-Za-z_]\w*)\s*;/g;
const MEMBER_PATTERN = /^([A-Za-z_]\w*)\s*(?:=\s*([\s\S]+))?$/;
const DEFINE_PATTERN = /^[ \t]*#[ \t]*define[ \t]+([A-Za-z_]\w*)[ \t]+(.+?)[ \t]*$/gm;
const PREPROCESSOR_LINE = /^[ \t]*#.*$/gm;

export interface ExtractOptions {
  /** C enum typedef names to keep */
  enumTypes?: readonly string[];
  /** Macro names to keep */
  macros?: readonly string[];
}

/**
 * Collect typedef'd enums whose type name is on the allow-list.
 * Members follow C numbering: an explicit value resets the counter,
 * an implicit one is the previous value + 1 (0 for the first).
 */
export function extractEnums(
  headerText: string,
  enumTypes: readonly string[] = Object.keys(ENUMS_OF_INTEREST),
  warnings: string[] = []
): ExtractedEnums {
  const enums: ExtractedEnums = {};
  const text = stripComments(headerText);

  for (const match of text.matchAll(ENUM_PATTERN)) {
    const typeName = match[2];
    if (!enumTypes.includes(typeName)) continue;

    const body = match[1].replace(PREPROCESSOR_LINE, '');
    const members: EnumMember[] = [];
    let current: number | null = null;

    for (const piece of body.split(',')) {
      const item = piece.trim();
      if (!item) continue;

      const memberMatch = item.match(MEMBER_PATTERN);
      if (!memberMatch) {
        warnings.push(`Skipping ${typeName} member '${item}': not an enumerator`);
        continue;
      }

      const name = memberMatch[1];
      const valueText = memberMatch[2]?.trim();

      if (valueText !== undefined) {
        const value = valueText === 'INT_MAX' ? FIRMWARE.INT_MAX : parseCInteger(valueText);
        if (value === undefined) {
          warnings.push(`Skipping ${typeName}.${name}: '${valueText}' is not an integer`);
          continue;
        }
        current = value;
      } else {
        current = current === null ? 0 : current + 1;
      }

      members.push({ name, value: current });
    }

    enums[typeName] = { typeName, members };
  }

  return enums;
}

/**
 * Collect integer #defines on the allow-list. BOTH_DIR_MASK is never read
 * from the text; it is the OR of the uplink and downlink masks when both exist.
 */
export function extractMacros(
  headerText: string,
  names: readonly string[] = MACROS_OF_INTEREST,
  warnings: string[] = []
): ExtractedMacros {
  const macros: ExtractedMacros = {};
  const text = stripComments(headerText);

  for (const match of text.matchAll(DEFINE_PATTERN)) {
    const name = match[1];
    if (!names.includes(name) || name === MACROS.BOTH_DIR_MASK) continue;

    const value = parseCInteger(match[2]);
    if (value === undefined) {
      warnings.push(`Skipping #define ${name}: '${match[2]}' is not an integer`);
      continue;
    }
    macros[name] = value;
  }

  const uplink = macros[MACROS.UPLINK_DIR_MASK];
  const downlink = macros[MACROS.DOWNLINK_DIR_MASK];
  if (uplink !== undefined && downlink !== undefined) {
    macros[MACROS.BOTH_DIR_MASK] = uplink | downlink;
  }

  return macros;
}

export function extractHeader(headerText: string, options: ExtractOptions = {}): HeaderFacts {
  const warnings: string[] = [];
  const enums = extractEnums(headerText, options.enumTypes, warnings);
  const macros = extractMacros(headerText, options.macros, warnings);
  return { enums, macros, warnings };
}
