import { MACROS, SELECTION, UNITS } from '../../constants/index.js';
import type { BandFilterTag, Direction, FilterSelection } from '../../types/index.js';
import type { FilterBandEntry, FilterBandModel } from './filter-band-model.js';
import type { FrequencyRange } from './frequency-range.js';

export interface OccupiedSpan {
  centreDmhz: number;
  lowDmhz: number;
  highDmhz: number;
}

/** kHz -> deci-MHz, rounding half up like the firmware's fixed-point code */
export function khzToDmhz(khz: number): number {
  return Math.floor((khz + UNITS.KHZ_PER_DMHZ / 2) / UNITS.KHZ_PER_DMHZ);
}

/**
 * Channel centre and occupied edges in deci-MHz. Half the bandwidth is
 * rounded up before the edges are converted.
 */
export function occupiedSpan(centreFreqKhz: number, bandwidthKhz: number): OccupiedSpan {
  const halfBandwidthKhz = Math.floor((bandwidthKhz + 1) / 2);
  return {
    centreDmhz: khzToDmhz(centreFreqKhz),
    lowDmhz: khzToDmhz(centreFreqKhz - halfBandwidthKhz),
    highDmhz: khzToDmhz(centreFreqKhz + halfBandwidthKhz),
  };
}

/** Passband used for a direction; 'both' takes whichever branch is populated */
export function rangeFor(entry: FilterBandEntry, direction: Direction): FrequencyRange {
  switch (direction) {
    case 'uplink':
      return entry.uplink;
    case 'downlink':
      return entry.downlink;
    default:
      return entry.uplink.isEmpty ? entry.downlink : entry.uplink;
  }
}

function assertQuery(centreFreqKhz: number, bandwidthKhz: number): void {
  if (!Number.isInteger(centreFreqKhz) || centreFreqKhz < 0) {
    throw new RangeError(`Centre frequency must be a non-negative integer in kHz, got ${centreFreqKhz}`);
  }
  if (!Number.isInteger(bandwidthKhz) || bandwidthKhz < 0) {
    throw new RangeError(`Bandwidth must be a non-negative integer in kHz, got ${bandwidthKhz}`);
  }
}

/**
 * Distance from the passband centre when the entry can carry the whole
 * occupied span in this direction, otherwise null.
 */
function centreOffset(entry: FilterBandEntry, span: OccupiedSpan, direction: Direction, requiredMask: number): number | null {
  if ((entry.directionMask & requiredMask) === 0) return null;

  const range = rangeFor(entry, direction);
  if (!range.containsSpan(span.lowDmhz, span.highDmhz)) return null;

  return Math.abs(span.centreDmhz - range.centreDmhz);
}

interface HuntResult {
  best: number | null;
  widebandPresent: boolean;
}

function hunt(
  model: FilterBandModel,
  span: OccupiedSpan,
  direction: Direction,
  candidateIds: readonly number[] | undefined,
  accept: (entry: FilterBandEntry) => boolean
): HuntResult {
  const requiredMask = model.directionMaskFor(direction);
  const ids = candidateIds ?? model.entries.map((e) => e.hardwareId);

  let best: number | null = null;
  let bestOffset = Number.POSITIVE_INFINITY;
  let widebandPresent = false;

  for (const id of ids) {
    const entry = model.get(id);
    if (!entry) continue;

    // The wideband filter never competes on distance; it is only a fallback
    if (id === model.widebandId) {
      widebandPresent = true;
      continue;
    }
    if (!accept(entry)) continue;

    const offset = centreOffset(entry, span, direction, requiredMask);
    // Strict comparison: on a tie the first candidate seen wins
    if (offset !== null && offset < bestOffset) {
      bestOffset = offset;
      best = id;
    }
  }

  return { best, widebandPresent };
}

/**
 * Pick the filter whose passband holds the occupied channel with the centre
 * frequency closest to the passband centre.
 *
 * When nothing qualifies and the wideband filter is among the candidates it
 * is returned without checking its mask or passband. Returns null when no
 * filter is suitable.
 */
export function selectFilter(
  model: FilterBandModel,
  centreFreqKhz: number,
  bandwidthKhz: number,
  direction: Direction,
  candidateIds?: readonly number[]
): number | null {
  if (centreFreqKhz >= SELECTION.MAX_FREQ_KHZ) return null;
  assertQuery(centreFreqKhz, bandwidthKhz);

  const span = occupiedSpan(centreFreqKhz, bandwidthKhz);
  const { best, widebandPresent } = hunt(model, span, direction, candidateIds, () => true);

  if (best === null && widebandPresent) return model.widebandId;
  return best;
}

/**
 * Like selectFilter, but first looks only at filters of one band. Falls back
 * to the unrestricted search when none of them fits.
 */
export function selectFilterForBand(
  model: FilterBandModel,
  centreFreqKhz: number,
  bandwidthKhz: number,
  band: BandFilterTag,
  direction: Direction,
  candidateIds?: readonly number[]
): number | null {
  if (centreFreqKhz >= SELECTION.MAX_FREQ_KHZ) return null;
  assertQuery(centreFreqKhz, bandwidthKhz);

  const span = occupiedSpan(centreFreqKhz, bandwidthKhz);
  const { best } = hunt(model, span, direction, candidateIds, (entry) => entry.band === band);
  if (best !== null) return best;

  return selectFilter(model, centreFreqKhz, bandwidthKhz, direction, candidateIds);
}

/** Filters fitted with forward and reverse paths swapped report the opposite direction */
export function resolveSwitchDirection(
  model: FilterBandModel,
  extraFlags: number,
  direction: 'uplink' | 'downlink'
): 'uplink' | 'downlink' {
  const swapMask = model.macros[MACROS.EXTRA_DATA_SWAP_FOR_AND_REV_MASK];
  if (swapMask === undefined || swapMask === 0 || (extraFlags & swapMask) !== swapMask) {
    return direction;
  }
  return direction === 'uplink' ? 'downlink' : 'uplink';
}

/**
 * Switch settings for a selected filter. The wideband fallback always runs
 * as uplink with no extra flags.
 */
export function describeSelection(model: FilterBandModel, hardwareId: number, direction: Direction): FilterSelection | null {
  const entry = model.get(hardwareId);
  if (!entry) return null;

  if (hardwareId === model.widebandId) {
    return { hardwareId, switchDirection: 'uplink', extraFlags: 0 };
  }

  let branch: 'uplink' | 'downlink';
  if (direction === 'both') {
    branch = entry.uplink.isEmpty ? 'downlink' : 'uplink';
  } else {
    branch = direction;
  }

  return {
    hardwareId,
    switchDirection: resolveSwitchDirection(model, entry.extraFlags, branch),
    extraFlags: entry.extraFlags,
  };
}

/**
 * Low or high passband edge in deci-MHz; 0 for an unknown id.
 * For 'both' the uplink edge is used unless it is 0.
 */
export function filterLimit(model: FilterBandModel, hardwareId: number, direction: Direction, edge: 'low' | 'high'): number {
  const entry = model.get(hardwareId);
  if (!entry) return 0;

  const pick = (range: FrequencyRange): number => (edge === 'low' ? range.lowDmhz : range.highDmhz);
  switch (direction) {
    case 'uplink':
      return pick(entry.uplink);
    case 'downlink':
      return pick(entry.downlink);
    default:
      return pick(entry.uplink) || pick(entry.downlink);
  }
}
