// src/stats/report.ts

import { formatTimestamp } from '../utils/utils.js';
import { RegisterValues } from '../types/sensor-types.js';
import { MinMaxSummary } from './min-max-tracker.js';

export const ACCELERATION_AXES = ['AccX', 'AccY', 'AccZ'] as const;

export type AccelerationAxis = (typeof ACCELERATION_AXES)[number];

const AXIS_LABELS: Record<AccelerationAxis, string> = {
  AccX: 'AX',
  AccY: 'AY',
  AccZ: 'AZ',
};

/**
 * Picks the acceleration axes out of decoded values; `null` if any is missing.
 */
export function pickAcceleration(
  values: RegisterValues
): Record<AccelerationAxis, number> | null {
  const x = values.get('AccX');
  const y = values.get('AccY');
  const z = values.get('AccZ');
  if (x === undefined || y === undefined || z === undefined) return null;
  return { AccX: x, AccY: y, AccZ: z };
}

/** `12:00:00.000 - AX: 0.500, AY: -1.000, AZ: 9.810, CRC: 59898`, checksum in decimal */
export function formatSampleLine(
  sample: Readonly<Record<AccelerationAxis, number>>,
  checksum: number,
  at: Date
): string {
  const parts = ACCELERATION_AXES.map(axis => `${AXIS_LABELS[axis]}: ${sample[axis].toFixed(3)}`);
  return `${formatTimestamp(at)} - ${parts.join(', ')}, CRC: ${checksum}`;
}

/** `12:00:00.000 - Min/Max AX: -1.000 / 1.000  |  AY: ...  |  AZ: ...` */
export function formatMinMaxLine(summary: MinMaxSummary<AccelerationAxis>, at: Date): string {
  const parts: string[] = [];
  for (const axis of ACCELERATION_AXES) {
    const extremes = summary.get(axis);
    if (!extremes) continue;
    parts.push(`${AXIS_LABELS[axis]}: ${extremes.min.toFixed(3)} / ${extremes.max.toFixed(3)}`);
  }
  return `${formatTimestamp(at)} - Min/Max ${parts.join('  |  ')}`;
}
