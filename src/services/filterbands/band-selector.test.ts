import { describe, it, expect } from 'vitest';
import {
  describeSelection,
  filterLimit,
  khzToDmhz,
  occupiedSpan,
  resolveSwitchDirection,
  selectFilter,
  selectFilterForBand,
} from './band-selector.js';
import { compileFilterBands } from '../compiler.js';
import { FIXTURE_HEADER, FIXTURE_SOURCE, GENERIC_ROWS, makeModel } from '../../__fixtures__/firmware.js';

describe('Band Selector', () => {
  const { model } = compileFilterBands(FIXTURE_HEADER, FIXTURE_SOURCE);

  describe('unit conversion', () => {
    it('should round kHz to the nearest deci-MHz, half up', () => {
      expect(khzToDmhz(836_049)).toBe(8360);
      expect(khzToDmhz(836_050)).toBe(8361);
      expect(khzToDmhz(0)).toBe(0);
    });

    it('should round half the bandwidth up before converting the edges', () => {
      expect(occupiedSpan(836_000, 201)).toEqual({ centreDmhz: 8360, lowDmhz: 8359, highDmhz: 8361 });
      expect(occupiedSpan(2_520_000, 5000)).toEqual({ centreDmhz: 25200, lowDmhz: 25175, highDmhz: 25225 });
    });
  });

  describe('selectFilter', () => {
    it('should select the only filter containing the channel', () => {
      expect(selectFilter(model, 836_000, 200, 'uplink')).toBe(2);
      expect(selectFilter(model, 881_000, 200, 'downlink')).toBe(3);
    });

    it('should skip filters without the requested direction', () => {
      expect(selectFilter(model, 1_747_500, 200, 'uplink')).toBe(4);
      expect(selectFilter(model, 1_842_500, 200, 'downlink')).toBe(4);
    });

    it('should use the populated branch for an unspecified direction', () => {
      expect(selectFilter(model, 836_000, 200, 'both')).toBe(2);
      expect(selectFilter(model, 881_000, 200, 'both')).toBe(3);
    });

    it('should prefer the filter whose centre is closest', () => {
      // 2520 MHz: wide filter centre 2535, narrow filter centre 2517.5
      expect(selectFilter(model, 2_520_000, 5000, 'uplink')).toBe(6);
      // 2530 MHz: wide filter centre is closer
      expect(selectFilter(model, 2_530_000, 10_000, 'uplink')).toBe(5);
    });

    it('should require the whole channel to fit inside the passband', () => {
      // 2535 MHz at 10 MHz spans 2530-2540, past the narrow filter's 2535 edge
      expect(selectFilter(model, 2_535_000, 10_000, 'uplink')).toBe(5);
      // 848 MHz at 4 MHz spans 846-850, past the 849 MHz edge
      expect(selectFilter(model, 848_000, 4000, 'uplink')).toBe(1);
    });

    it('should fall back to the wideband filter when nothing fits', () => {
      expect(selectFilter(model, 881_000, 200, 'uplink')).toBe(1);
    });

    it('should fall back to the wideband filter without checking its passband', () => {
      // 100 kHz downlink: the wideband filter is uplink-only and starts at 10 MHz
      expect(selectFilter(model, 100, 0, 'downlink')).toBe(1);
    });

    it('should never select an empty passband', () => {
      expect(selectFilter(model, 0, 0, 'both')).toBe(1);
    });

    it('should return null at and above 6 GHz', () => {
      expect(selectFilter(model, 6_000_000, 0, 'uplink')).toBeNull();
      expect(selectFilter(model, 7_000_000, 0, 'both')).toBeNull();
      expect(selectFilter(model, 5_999_999, 0, 'uplink')).toBe(1);
    });

    it('should search only the given candidates', () => {
      expect(selectFilter(model, 2_520_000, 5000, 'uplink', [5])).toBe(5);
      expect(selectFilter(model, 881_000, 200, 'uplink', [2, 3])).toBeNull();
      expect(selectFilter(model, 881_000, 200, 'uplink', [1, 2])).toBe(1);
    });

    it('should skip candidate ids outside the table', () => {
      expect(selectFilter(model, 836_000, 200, 'uplink', [99, -1, 2])).toBe(2);
      expect(selectFilter(model, 836_000, 200, 'uplink', [])).toBeNull();
    });

    it('should let the first candidate win an exact tie', () => {
      const twins = makeModel([
        ...GENERIC_ROWS,
        { uplink: [8000, 9000], downlink: [0, 0], directionMask: 1 },
        { uplink: [8000, 9000], downlink: [0, 0], directionMask: 1 },
      ]);

      expect(selectFilter(twins, 850_000, 0, 'uplink')).toBe(2);
      expect(selectFilter(twins, 850_000, 0, 'uplink', [3, 2])).toBe(3);
    });

    it('should return null without a wideband filter', () => {
      const bare = makeModel([{ uplink: [8000, 9000], downlink: [0, 0], directionMask: 1 }]);
      expect(selectFilter(bare, 2_000_000, 0, 'uplink')).toBeNull();
    });

    it('should return null above the ceiling before validating the bandwidth', () => {
      expect(selectFilter(model, 6_000_000, -5, 'uplink')).toBeNull();
      expect(selectFilterForBand(model, 6_000_000, 1.5, 'BAND_FILTER_LTE7', 'uplink')).toBeNull();
    });

    it('should reject negative or fractional inputs', () => {
      expect(() => selectFilter(model, -1, 0, 'uplink')).toThrow(RangeError);
      expect(() => selectFilter(model, 836_000, 1.5, 'uplink')).toThrow(RangeError);
    });
  });

  describe('selectFilterForBand', () => {
    it('should look inside the requested band first', () => {
      expect(selectFilterForBand(model, 2_520_000, 5000, 'BAND_FILTER_LTE7', 'uplink')).toBe(6);
    });

    it('should fall back to the full table when the band has no fit', () => {
      expect(selectFilterForBand(model, 836_000, 200, 'BAND_FILTER_DCS1800', 'uplink')).toBe(2);
      expect(selectFilterForBand(model, 881_000, 200, 'BAND_FILTER_GSM850', 'uplink')).toBe(1);
    });

    it('should prefer a band member over a closer filter elsewhere', () => {
      const overlapping = makeModel([
        ...GENERIC_ROWS,
        { uplink: [8000, 9000], downlink: [0, 0], directionMask: 1, band: 'BAND_FILTER_TEST' },
        { uplink: [8000, 8700], downlink: [0, 0], directionMask: 1, band: 'BAND_FILTER_EMPTY' },
      ]);

      expect(selectFilter(overlapping, 835_000, 0, 'uplink')).toBe(3);
      expect(selectFilterForBand(overlapping, 835_000, 0, 'BAND_FILTER_TEST', 'uplink')).toBe(2);
    });
  });

  describe('resolveSwitchDirection', () => {
    it('should swap the direction only when the swap flag is set', () => {
      expect(resolveSwitchDirection(model, 2, 'uplink')).toBe('downlink');
      expect(resolveSwitchDirection(model, 3, 'downlink')).toBe('uplink');
      expect(resolveSwitchDirection(model, 1, 'uplink')).toBe('uplink');
      expect(resolveSwitchDirection(model, 0, 'downlink')).toBe('downlink');
    });
  });

  describe('describeSelection', () => {
    it('should report the switch setting for a selected filter', () => {
      expect(describeSelection(model, 4, 'uplink')).toEqual({ hardwareId: 4, switchDirection: 'uplink', extraFlags: 1 });
      expect(describeSelection(model, 5, 'uplink')).toEqual({ hardwareId: 5, switchDirection: 'downlink', extraFlags: 2 });
    });

    it('should use the populated branch for an unspecified direction', () => {
      expect(describeSelection(model, 3, 'both')).toEqual({ hardwareId: 3, switchDirection: 'downlink', extraFlags: 0 });
    });

    it('should always run the wideband filter as uplink with no flags', () => {
      expect(describeSelection(model, 1, 'downlink')).toEqual({ hardwareId: 1, switchDirection: 'uplink', extraFlags: 0 });
    });

    it('should return null for an unknown id', () => {
      expect(describeSelection(model, 99, 'uplink')).toBeNull();
    });
  });

  describe('filterLimit', () => {
    it('should return the edge for the requested direction', () => {
      expect(filterLimit(model, 4, 'uplink', 'low')).toBe(17100);
      expect(filterLimit(model, 4, 'downlink', 'high')).toBe(18800);
    });

    it('should use the downlink edge when the uplink branch is empty', () => {
      expect(filterLimit(model, 3, 'both', 'low')).toBe(8690);
      expect(filterLimit(model, 4, 'both', 'high')).toBe(17850);
    });

    it('should return 0 for an unknown id', () => {
      expect(filterLimit(model, 99, 'uplink', 'low')).toBe(0);
    });
  });
});
