// =============================================================================
// Query Types
// =============================================================================

/** Signal direction of a query; 'both' means unspecified */
export type Direction = 'uplink' | 'downlink' | 'both';

export const DIRECTIONS: readonly Direction[] = ['uplink', 'downlink', 'both'];

/** Band-filter member name, e.g. BAND_FILTER_LTE7 */
export type BandFilterTag = string;

/** Calibration lookup member name, e.g. COVERT872CALDATALOOKUP_LTE_7 */
export type CalibrationTag = string;

// =============================================================================
// Header Facts (Lexical Extractor output)
// =============================================================================

export interface EnumMember {
  name: string;
  value: number;
}

export interface ExtractedEnum {
  /** C typedef name, e.g. band_filter_t */
  typeName: string;
  members: EnumMember[];
}

export type ExtractedEnums = Record<string, ExtractedEnum>;

export type ExtractedMacros = Record<string, number>;

export interface HeaderFacts {
  enums: ExtractedEnums;
  macros: ExtractedMacros;
  /** Definitions that matched a pattern but had no integer value */
  warnings: string[];
}

// =============================================================================
// Array Elements (Array Literal Parser output)
// =============================================================================

/** A field written either as a number or as a named constant */
export type IntegerToken =
  | { kind: 'literal'; value: number }
  | { kind: 'named'; name: string };

export type EdgePair = readonly [low: number, high: number];

export interface FilterBandElement {
  /** Zero-based position inside the array literal */
  index: number;
  /** 1-based line in the source file */
  line: number;
  uplink: EdgePair;
  downlink: EdgePair;
  directionToken: string;
  legacyFilterId: number;
  bandToken: string;
  protocolBandNumber: number;
  filterSlot: number;
  filtersInGroup: number;
  extra: IntegerToken;
  calibrationToken: string;
}

// =============================================================================
// Serialized Model
// =============================================================================

export interface FilterBandEntryRecord {
  hardwareId: number;
  uplink: EdgePair;
  downlink: EdgePair;
  directionMask: number;
  legacyFilterId: number;
  band: BandFilterTag;
  protocolBandNumber: number;
  filterSlot: number;
  filtersInGroup: number;
  extraFlags: number;
  calibrationGroup: CalibrationTag;
}

/** Plain-data form of a compiled model, as embedded in the generated module */
export interface FilterBandSnapshot {
  enums: {
    direction: ExtractedEnum;
    bandFilter: ExtractedEnum;
    calibrationLookup: ExtractedEnum;
  };
  macros: ExtractedMacros;
  widebandId: number;
  entries: FilterBandEntryRecord[];
}

// =============================================================================
// Selection Results
// =============================================================================

export interface FilterSelection {
  hardwareId: number;
  /** Direction to drive the forward/reverse switch, after any swap */
  switchDirection: 'uplink' | 'downlink';
  extraFlags: number;
}
