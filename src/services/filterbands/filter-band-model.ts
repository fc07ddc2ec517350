import { MACROS, SELECTION } from '../../constants/index.js';
import type {
  BandFilterTag,
  CalibrationTag,
  Direction,
  ExtractedEnum,
  ExtractedMacros,
  FilterBandEntryRecord,
  FilterBandSnapshot,
} from '../../types/index.js';
import { ModelInvariantError } from '../firmware/errors.js';
import { EnumDefinition } from './enum-definition.js';
import { FrequencyRange } from './frequency-range.js';
import { selectFilter } from './band-selector.js';

/** One physical filter; hardwareId is its position in the firmware table */
export interface FilterBandEntry {
  readonly hardwareId: number;
  readonly uplink: FrequencyRange;
  readonly downlink: FrequencyRange;
  readonly directionMask: number;
  readonly legacyFilterId: number;
  readonly band: BandFilterTag;
  readonly protocolBandNumber: number;
  readonly filterSlot: number;
  readonly filtersInGroup: number;
  readonly extraFlags: number;
  readonly calibrationGroup: CalibrationTag;
}

export interface FilterBandModelInit {
  enums: {
    direction: ExtractedEnum;
    bandFilter: ExtractedEnum;
    calibrationLookup: ExtractedEnum;
  };
  macros: ExtractedMacros;
  widebandId?: number;
  entries: FilterBandEntry[];
}

function groupBy<K>(entries: readonly FilterBandEntry[], key: (e: FilterBandEntry) => K): ReadonlyMap<K, readonly FilterBandEntry[]> {
  const groups = new Map<K, FilterBandEntry[]>();
  for (const entry of entries) {
    const k = key(entry);
    const list = groups.get(k);
    if (list) {
      list.push(entry);
    } else {
      groups.set(k, [entry]);
    }
  }
  for (const list of groups.values()) {
    Object.freeze(list);
  }
  return groups;
}

export function entryFromRecord(record: FilterBandEntryRecord): FilterBandEntry {
  return Object.freeze({
    hardwareId: record.hardwareId,
    uplink: FrequencyRange.fromPair(record.uplink),
    downlink: FrequencyRange.fromPair(record.downlink),
    directionMask: record.directionMask,
    legacyFilterId: record.legacyFilterId,
    band: record.band,
    protocolBandNumber: record.protocolBandNumber,
    filterSlot: record.filterSlot,
    filtersInGroup: record.filtersInGroup,
    extraFlags: record.extraFlags,
    calibrationGroup: record.calibrationGroup,
  });
}

export function entryToRecord(entry: FilterBandEntry): FilterBandEntryRecord {
  return {
    hardwareId: entry.hardwareId,
    uplink: entry.uplink.toPair(),
    downlink: entry.downlink.toPair(),
    directionMask: entry.directionMask,
    legacyFilterId: entry.legacyFilterId,
    band: entry.band,
    protocolBandNumber: entry.protocolBandNumber,
    filterSlot: entry.filterSlot,
    filtersInGroup: entry.filtersInGroup,
    extraFlags: entry.extraFlags,
    calibrationGroup: entry.calibrationGroup,
  };
}

/**
 * The compiled filter table. Built once and frozen; safe to share between
 * any number of concurrent readers.
 */
export class FilterBandModel {
  readonly entries: readonly FilterBandEntry[];
  readonly byBand: ReadonlyMap<BandFilterTag, readonly FilterBandEntry[]>;
  readonly byProtocolBand: ReadonlyMap<number, readonly FilterBandEntry[]>;
  readonly byCalibrationGroup: ReadonlyMap<CalibrationTag, readonly FilterBandEntry[]>;
  readonly directionEnum: EnumDefinition;
  readonly bandFilterEnum: EnumDefinition;
  readonly calibrationEnum: EnumDefinition;
  readonly macros: Readonly<ExtractedMacros>;
  readonly widebandId: number;

  constructor(init: FilterBandModelInit) {
    this.directionEnum = new EnumDefinition(init.enums.direction);
    this.bandFilterEnum = new EnumDefinition(init.enums.bandFilter);
    this.calibrationEnum = new EnumDefinition(init.enums.calibrationLookup);
    this.macros = Object.freeze({ ...init.macros });
    this.widebandId = init.widebandId ?? this.macros[MACROS.WIDEBAND_FILTER_ID] ?? SELECTION.DEFAULT_WIDEBAND_FILTER_ID;

    const both = this.macros[MACROS.BOTH_DIR_MASK];
    init.entries.forEach((entry, position) => {
      if (entry.hardwareId !== position) {
        throw new ModelInvariantError(`Entry at position ${position} has hardware id ${entry.hardwareId}`);
      }
      if (both !== undefined && (entry.directionMask & ~both) !== 0) {
        throw new ModelInvariantError(`Entry ${position}: direction mask ${entry.directionMask} has bits outside ${both}`);
      }
    });

    this.entries = Object.freeze([...init.entries]);
    this.byBand = groupBy(this.entries, (e) => e.band);
    this.byProtocolBand = groupBy(this.entries, (e) => e.protocolBandNumber);
    this.byCalibrationGroup = groupBy(this.entries, (e) => e.calibrationGroup);
    Object.freeze(this);
  }

  get size(): number {
    return this.entries.length;
  }

  get(hardwareId: number): FilterBandEntry | undefined {
    return Number.isInteger(hardwareId) ? this.entries[hardwareId] : undefined;
  }

  filtersForBand(band: BandFilterTag): readonly FilterBandEntry[] {
    return this.byBand.get(band) ?? [];
  }

  filtersForProtocolBand(protocolBandNumber: number): readonly FilterBandEntry[] {
    return this.byProtocolBand.get(protocolBandNumber) ?? [];
  }

  filtersForCalibrationGroup(group: CalibrationTag): readonly FilterBandEntry[] {
    return this.byCalibrationGroup.get(group) ?? [];
  }

  /** Capability bit(s) a filter must carry to serve a query direction */
  directionMaskFor(direction: Direction): number {
    switch (direction) {
      case 'uplink':
        return this.macros[MACROS.UPLINK_DIR_MASK] ?? 0;
      case 'downlink':
        return this.macros[MACROS.DOWNLINK_DIR_MASK] ?? 0;
      default:
        // unspecified direction: either bit qualifies
        return this.macros[MACROS.BOTH_DIR_MASK] ?? 0;
    }
  }

  select(centreFreqKhz: number, bandwidthKhz: number, direction: Direction, candidateIds?: readonly number[]): number | null {
    return selectFilter(this, centreFreqKhz, bandwidthKhz, direction, candidateIds);
  }

  toSnapshot(): FilterBandSnapshot {
    return {
      enums: {
        direction: this.directionEnum.toJSON(),
        bandFilter: this.bandFilterEnum.toJSON(),
        calibrationLookup: this.calibrationEnum.toJSON(),
      },
      macros: { ...this.macros },
      widebandId: this.widebandId,
      entries: this.entries.map(entryToRecord),
    };
  }

  static fromSnapshot(snapshot: FilterBandSnapshot): FilterBandModel {
    return new FilterBandModel({
      enums: snapshot.enums,
      macros: snapshot.macros,
      widebandId: snapshot.widebandId,
      entries: snapshot.entries.map(entryFromRecord),
    });
  }
}
