// src/stats/min-max-tracker.ts

import { formatTimestamp } from '../utils/utils.js';

export interface AxisExtremes {
  min: number;
  max: number;
  /** Time of the first sample that reached `min` */
  minAt: string;
  /** Time of the first sample that reached `max` */
  maxAt: string;
}

export type MinMaxSummary<K extends string> = ReadonlyMap<K, Readonly<AxisExtremes>>;

/**
 * Running minimum and maximum per axis. Only a strictly smaller or larger
 * value replaces an extreme, so ties keep the earlier timestamp.
 */
export class MinMaxTracker<K extends string> {
  private readonly axes: readonly K[];
  private readonly clock: () => Date;
  private extremes: Map<K, AxisExtremes> = new Map();
  private _count: number = 0;

  constructor(axes: readonly K[], clock: () => Date = () => new Date()) {
    if (axes.length === 0) throw new RangeError('At least one axis is required');
    this.axes = axes;
    this.clock = clock;
  }

  public get count(): number {
    return this._count;
  }

  /**
   * Adds one sample.
   * @returns number of samples recorded since the last reset
   */
  public record(sample: Readonly<Record<K, number>>): number {
    const at = formatTimestamp(this.clock());
    for (const axis of this.axes) {
      const value = sample[axis];
      const current = this.extremes.get(axis);
      if (!current) {
        this.extremes.set(axis, { min: value, max: value, minAt: at, maxAt: at });
        continue;
      }
      if (value < current.min) {
        current.min = value;
        current.minAt = at;
      }
      if (value > current.max) {
        current.max = value;
        current.maxAt = at;
      }
    }
    this._count++;
    return this._count;
  }

  /**
   * Extremes per axis, or `null` before the first sample.
   */
  public summary(): MinMaxSummary<K> | null {
    if (this._count === 0) return null;
    const summary = new Map<K, Readonly<AxisExtremes>>();
    for (const axis of this.axes) {
      const extremes = this.extremes.get(axis);
      if (extremes) summary.set(axis, { ...extremes });
    }
    return summary;
  }

  public reset(): void {
    this.extremes = new Map();
    this._count = 0;
  }
}
