import { UNITS } from '../../constants/index.js';
import type { EdgePair } from '../../types/index.js';

/**
 * A filter passband in deci-MHz. The stored edges are the only source of
 * truth; MHz and Hz views are computed on read.
 *
 * (0, 0) means the filter has no branch in this direction. Such a range
 * contains nothing, not even 0.
 */
export class FrequencyRange {
  readonly lowDmhz: number;
  readonly highDmhz: number;

  constructor(lowDmhz: number, highDmhz: number) {
    if (!Number.isInteger(lowDmhz) || !Number.isInteger(highDmhz)) {
      throw new RangeError(`Frequency edges must be integers in deci-MHz, got (${lowDmhz}, ${highDmhz})`);
    }
    this.lowDmhz = lowDmhz;
    this.highDmhz = highDmhz;
    Object.freeze(this);
  }

  static fromPair(pair: EdgePair): FrequencyRange {
    return new FrequencyRange(pair[0], pair[1]);
  }

  get isEmpty(): boolean {
    return this.lowDmhz === 0 && this.highDmhz === 0;
  }

  get lowMhz(): number {
    return this.lowDmhz / UNITS.DMHZ_PER_MHZ;
  }

  get highMhz(): number {
    return this.highDmhz / UNITS.DMHZ_PER_MHZ;
  }

  get lowHz(): number {
    return this.lowDmhz * UNITS.HZ_PER_DMHZ;
  }

  get highHz(): number {
    return this.highDmhz * UNITS.HZ_PER_DMHZ;
  }

  /** Integer midpoint, rounded down as the firmware does */
  get centreDmhz(): number {
    return Math.floor((this.lowDmhz + this.highDmhz) / 2);
  }

  contains(dmhz: number): boolean {
    if (this.isEmpty) return false;
    return this.lowDmhz <= dmhz && dmhz <= this.highDmhz;
  }

  /** True when the whole span [lowDmhz, highDmhz] fits inside the passband */
  containsSpan(lowDmhz: number, highDmhz: number): boolean {
    if (this.isEmpty) return false;
    return this.lowDmhz <= lowDmhz && highDmhz <= this.highDmhz;
  }

  toPair(): EdgePair {
    return [this.lowDmhz, this.highDmhz];
  }

  toJSON(): { lowDmhz: number; highDmhz: number } {
    return { lowDmhz: this.lowDmhz, highDmhz: this.highDmhz };
  }

  toString(): string {
    return this.isEmpty ? '-' : `${this.lowMhz.toFixed(1)}-${this.highMhz.toFixed(1)} MHz`;
  }
}
