import { DIRECTION_MASK_TOKENS, MACROS } from '../../constants/index.js';
import type { EnumTypeName } from '../../constants/index.js';
import type { ExtractedEnum, FilterBandElement, HeaderFacts, IntegerToken } from '../../types/index.js';
import { ModelInvariantError, UnknownReferenceError } from '../firmware/errors.js';
import { EnumDefinition } from './enum-definition.js';
import { FilterBandModel, type FilterBandEntry } from './filter-band-model.js';
import { FrequencyRange } from './frequency-range.js';

export interface BuildResult {
  model: FilterBandModel;
  /** Non-fatal problems, e.g. an unknown extra-data macro replaced by 0 */
  warnings: string[];
}

function enumOrEmpty(facts: HeaderFacts, typeName: EnumTypeName): ExtractedEnum {
  return facts.enums[typeName] ?? { typeName, members: [] };
}

function resolveDirectionMask(facts: HeaderFacts, element: FilterBandElement): number {
  const mask = DIRECTION_MASK_TOKENS.includes(element.directionToken)
    ? facts.macros[element.directionToken]
    : undefined;
  if (mask === undefined) {
    throw new UnknownReferenceError('direction mask', element.directionToken, element.index);
  }
  return mask;
}

function resolveExtra(facts: HeaderFacts, element: FilterBandElement, warnings: string[]): number {
  const token: IntegerToken = element.extra;
  if (token.kind === 'literal') return token.value;

  const value = Object.hasOwn(facts.macros, token.name) ? facts.macros[token.name] : undefined;
  if (value === undefined) {
    warnings.push(`Entry ${element.index} (line ${element.line}): unknown extra data macro '${token.name}', using 0`);
    return 0;
  }
  return value;
}

/**
 * Merge header facts and parsed array elements into a FilterBandModel.
 * Unknown band, calibration or direction names are fatal; an unknown
 * extra-data name is not.
 */
export function buildFilterBandModel(facts: HeaderFacts, elements: readonly FilterBandElement[]): BuildResult {
  const warnings: string[] = [];

  const direction = enumOrEmpty(facts, 'duplexor_direction_t');
  const bandFilter = enumOrEmpty(facts, 'band_filter_t');
  const calibrationLookup = enumOrEmpty(facts, 'Covert872CalDataLookup_t');
  const bands = new EnumDefinition(bandFilter);
  const calibrations = new EnumDefinition(calibrationLookup);

  const seen = new Set<number>();
  const entries: FilterBandEntry[] = elements.map((element, position) => {
    if (element.index !== position || seen.has(element.index)) {
      throw new ModelInvariantError(`Array element ${element.index} found at position ${position}`);
    }
    seen.add(element.index);

    if (!bands.has(element.bandToken)) {
      throw new UnknownReferenceError('band filter', element.bandToken, element.index);
    }
    if (!calibrations.has(element.calibrationToken)) {
      throw new UnknownReferenceError('calibration lookup', element.calibrationToken, element.index);
    }

    return Object.freeze({
      hardwareId: position,
      uplink: FrequencyRange.fromPair(element.uplink),
      downlink: FrequencyRange.fromPair(element.downlink),
      directionMask: resolveDirectionMask(facts, element),
      legacyFilterId: element.legacyFilterId,
      band: element.bandToken,
      protocolBandNumber: element.protocolBandNumber,
      filterSlot: element.filterSlot,
      filtersInGroup: element.filtersInGroup,
      extraFlags: resolveExtra(facts, element, warnings),
      calibrationGroup: element.calibrationToken,
    });
  });

  const model = new FilterBandModel({
    enums: { direction, bandFilter, calibrationLookup },
    macros: facts.macros,
    widebandId: facts.macros[MACROS.WIDEBAND_FILTER_ID],
    entries,
  });

  return { model, warnings };
}
