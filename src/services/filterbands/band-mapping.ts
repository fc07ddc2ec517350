import { SELECTION, THREEGPP_BAND_FILTERS } from '../../constants/index.js';
import type { BandFilterTag } from '../../types/index.js';

/**
 * Band-filter tag serving a 3GPP operating band. Bands without a dedicated
 * filter map to the wideband filter.
 */
export function bandFilterFor3gppBand(bandNumber: number): BandFilterTag {
  return THREEGPP_BAND_FILTERS[bandNumber] ?? SELECTION.WIDEBAND_BAND_TAG;
}
