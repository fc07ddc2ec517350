import type { FilterBandEntryRecord } from '../types/index.js';
import { FilterBandModel, entryFromRecord } from '../services/filterbands/filter-band-model.js';

/**
 * Trimmed-down firmware header and source used across the test suites.
 *
 * Hardware ids in FIXTURE_SOURCE:
 *   0 not fitted, 1 wideband, 2/3 GSM850 UL/DL, 4 DCS1800 duplexer,
 *   5/6 LTE7 wide and narrow (named and literal swap flag)
 */
export const FIXTURE_HEADER = [
  '#ifndef rxFilterBands_included',
  '#define rxFilterBands_included',
  '',
  'typedef enum {',
  '\tDD_UNKNOWN\t= -1,',
  '\tDD_UPLINK\t= 0,',
  '\tDD_DOWNLINK,',
  '\tDD_MAX_NO',
  '} duplexor_direction_t;',
  '',
  'typedef enum {',
  '\tBAND_FILTER_GSM850\t=\t4,',
  '\tBAND_FILTER_DCS1800\t=\t8,',
  '\tBAND_FILTER_EMPTY\t=\t14,',
  '\tBAND_FILTER_WIDE,\t\t// catch-all',
  '\tBAND_FILTER_LTE7,',
  '',
  '\tBAND_FILTER_MAX_NO\t=\tINT_MAX',
  '} band_filter_t;',
  '',
  '#define UPLINK_DIR_MASK\t\t(1)',
  '#define DOWNLINK_DIR_MASK\t(2)',
  '#define BOTH_DIR_MASK\t\t(UPLINK_DIR_MASK | DOWNLINK_DIR_MASK)',
  '',
  'typedef enum {',
  '\tCOVERT872CALDATALOOKUP_NO_LOOKUP = 0,',
  '\tCOVERT872CALDATALOOKUP_WIDEBAND,',
  '\tCOVERT872CALDATALOOKUP_LTE_7,',
  '',
  '\tCOVERT872CALDATALOOKUP_NO_OF_ENTRIES',
  '} Covert872CalDataLookup_t;',
  '',
  '#define EXTRA_DATA_FORREV_MASK\t\t\t\t1',
  '#define EXTRA_DATA_SWAP_FOR_AND_REV_MASK\t2',
  '',
  '#define NOT_FITTED_FILTER_ID\t\t0',
  '#define WIDEBAND_FILTER_ID\t\t\t1',
  '',
  '#endif',
].join('\n');

export const FIXTURE_SOURCE = [
  '#include "rxFilterBands.h"',
  '',
  'RxFilterBand_t const rxFilterBands[] = {',
  '//    Uplink           Downlink         Direction          Id  Band                  LTE # of extra                             Cal lookup',
  '    {{    0,     0}, {    0,     0}, BOTH_DIR_MASK,      0, BAND_FILTER_EMPTY,   -1, 1, 1, 0,                                COVERT872CALDATALOOKUP_NO_LOOKUP}, // 0x00 not fitted',
  '    {{  100, 60000}, {    0,     0}, UPLINK_DIR_MASK,    1, BAND_FILTER_WIDE,     0, 1, 1, 0,                                COVERT872CALDATALOOKUP_WIDEBAND},  // 0x01 wideband',
  '    {{ 8240,  8490}, {    0,     0}, UPLINK_DIR_MASK,    5, BAND_FILTER_GSM850,   5, 1, 1, 0,                                COVERT872CALDATALOOKUP_NO_LOOKUP}, // 0x02 UL 850',
  '    {{    0,     0}, { 8690,  8940}, DOWNLINK_DIR_MASK,  4, BAND_FILTER_GSM850,   5, 1, 1, 0,                                COVERT872CALDATALOOKUP_NO_LOOKUP}, // 0x03 DL "}"',
  '    {{17100, 17850}, {18050, 18800}, BOTH_DIR_MASK,      7, BAND_FILTER_DCS1800,  3, 1, 1, EXTRA_DATA_FORREV_MASK,           COVERT872CALDATALOOKUP_NO_LOOKUP}, // 0x04 1800',
  '    {{25000, 25700}, {26200, 26900}, BOTH_DIR_MASK,     12, BAND_FILTER_LTE7,     7, 1, 2, EXTRA_DATA_SWAP_FOR_AND_REV_MASK, COVERT872CALDATALOOKUP_LTE_7},     // 0x05 LTE 7 wide',
  '    {{25000, 25350}, {26200, 26550}, BOTH_DIR_MASK,     12, BAND_FILTER_LTE7,     7, 2, 2, 0x02,                             COVERT872CALDATALOOKUP_LTE_7},     // 0x06 LTE 7 narrow',
  '};',
].join('\n');

export const FIXTURE_ENUMS = {
  direction: {
    typeName: 'duplexor_direction_t',
    members: [
      { name: 'DD_UPLINK', value: 0 },
      { name: 'DD_DOWNLINK', value: 1 },
    ],
  },
  bandFilter: {
    typeName: 'band_filter_t',
    members: [
      { name: 'BAND_FILTER_EMPTY', value: 0 },
      { name: 'BAND_FILTER_WIDE', value: 1 },
      { name: 'BAND_FILTER_TEST', value: 2 },
    ],
  },
  calibrationLookup: {
    typeName: 'Covert872CalDataLookup_t',
    members: [{ name: 'CAL_NONE', value: 0 }],
  },
};

export const FIXTURE_MACROS = {
  UPLINK_DIR_MASK: 1,
  DOWNLINK_DIR_MASK: 2,
  BOTH_DIR_MASK: 3,
  EXTRA_DATA_FORREV_MASK: 1,
  EXTRA_DATA_SWAP_FOR_AND_REV_MASK: 2,
  WIDEBAND_FILTER_ID: 1,
};

export type FixtureRow = Pick<FilterBandEntryRecord, 'uplink' | 'downlink' | 'directionMask'> &
  Partial<Omit<FilterBandEntryRecord, 'hardwareId'>>;

/** Build a model straight from rows; hardware ids follow row order */
export function makeModel(rows: FixtureRow[]): FilterBandModel {
  return new FilterBandModel({
    enums: FIXTURE_ENUMS,
    macros: FIXTURE_MACROS,
    entries: rows.map((row, hardwareId) =>
      entryFromRecord({
        legacyFilterId: 0,
        band: 'BAND_FILTER_TEST',
        protocolBandNumber: -1,
        filterSlot: 1,
        filtersInGroup: 1,
        extraFlags: 0,
        calibrationGroup: 'CAL_NONE',
        ...row,
        hardwareId,
      })
    ),
  });
}

/** Row 0 not fitted, row 1 wideband, as in the firmware layout */
export const GENERIC_ROWS: FixtureRow[] = [
  { uplink: [0, 0], downlink: [0, 0], directionMask: 3, band: 'BAND_FILTER_EMPTY' },
  { uplink: [100, 60000], downlink: [0, 0], directionMask: 1, band: 'BAND_FILTER_WIDE' },
];
