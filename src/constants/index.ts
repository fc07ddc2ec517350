/**
 * Constants for the RX filter-band compiler.
 * Centralizes firmware names, sentinel values and selection limits.
 */

// =============================================================================
// Firmware Source Contract
// =============================================================================

export const FIRMWARE = {
  /** Name of the struct-array literal holding the filter table */
  ARRAY_NAME: 'rxFilterBands',

  /** Struct type of each array element */
  ARRAY_TYPE: 'RxFilterBand_t',

  /** Value of the INT_MAX sentinel (limits.h, 32-bit) */
  INT_MAX: 2_147_483_647,
} as const;

/** C enum type name -> name used in the generated module */
export const ENUMS_OF_INTEREST = {
  duplexor_direction_t: 'DuplexorDirection',
  band_filter_t: 'BandFilter',
  Covert872CalDataLookup_t: 'CalDataLookup',
} as const;

export type EnumTypeName = keyof typeof ENUMS_OF_INTEREST;

export const MACROS = {
  UPLINK_DIR_MASK: 'UPLINK_DIR_MASK',
  DOWNLINK_DIR_MASK: 'DOWNLINK_DIR_MASK',
  BOTH_DIR_MASK: 'BOTH_DIR_MASK',
  EXTRA_DATA_FORREV_MASK: 'EXTRA_DATA_FORREV_MASK',
  EXTRA_DATA_SWAP_FOR_AND_REV_MASK: 'EXTRA_DATA_SWAP_FOR_AND_REV_MASK',
  WIDEBAND_FILTER_ID: 'WIDEBAND_FILTER_ID',
} as const;

export const MACROS_OF_INTEREST: readonly string[] = Object.values(MACROS);

/** Tokens allowed in the direction column of an array element */
export const DIRECTION_MASK_TOKENS: readonly string[] = [
  MACROS.UPLINK_DIR_MASK,
  MACROS.DOWNLINK_DIR_MASK,
  MACROS.BOTH_DIR_MASK,
];

// =============================================================================
// Band Selection
// =============================================================================

export const SELECTION = {
  /** Queries at or above 6 GHz are outside the table */
  MAX_FREQ_KHZ: 6_000_000,

  /** Hardware id of the wideband catch-all when the header does not define one */
  DEFAULT_WIDEBAND_FILTER_ID: 1,

  /** Tag reported for 3GPP bands with no dedicated filter */
  WIDEBAND_BAND_TAG: 'BAND_FILTER_WIDE',
} as const;

// =============================================================================
// Units
// =============================================================================

export const UNITS = {
  /** kHz per deci-MHz */
  KHZ_PER_DMHZ: 100,

  /** Hz per deci-MHz */
  HZ_PER_DMHZ: 100_000,

  /** deci-MHz per MHz */
  DMHZ_PER_MHZ: 10,
} as const;

// =============================================================================
// 3GPP Band Mapping
// =============================================================================

/** 3GPP operating band number -> band-filter tag */
export const THREEGPP_BAND_FILTERS: Readonly<Record<number, string>> = {
  1: 'BAND_FILTER_3GBAND1',
  2: 'BAND_FILTER_PCS1900',
  3: 'BAND_FILTER_DCS1800',
  5: 'BAND_FILTER_GSM850',
  7: 'BAND_FILTER_LTE7',
  8: 'BAND_FILTER_EGSM900',
  9: 'BAND_FILTER_DCS1800',
  12: 'BAND_FILTER_LTE12',
  13: 'BAND_FILTER_LTE13',
  17: 'BAND_FILTER_LTE17',
  20: 'BAND_FILTER_LTE20',
  25: 'BAND_FILTER_LTE25',
  26: 'BAND_FILTER_LTE26',
  27: 'BAND_FILTER_IDEN',
  28: 'BAND_FILTER_LTE28',
  31: 'BAND_FILTER_CDMA450',
  38: 'BAND_FILTER_LTE38',
  39: 'BAND_FILTER_LTE25',
  40: 'BAND_FILTER_LTE40',
  41: 'BAND_FILTER_LTE41',
  42: 'BAND_FILTER_N77',
  43: 'BAND_FILTER_N77',
  52: 'BAND_FILTER_N77',
  71: 'BAND_FILTER_LTE71',
  77: 'BAND_FILTER_N77',
  78: 'BAND_FILTER_N77',
};

// =============================================================================
// Source Watcher
// =============================================================================

export const WATCHER = {
  /** Wait for editors to finish writing before recompiling */
  STABILITY_THRESHOLD_MS: 300,
  POLL_INTERVAL_MS: 100,
} as const;
