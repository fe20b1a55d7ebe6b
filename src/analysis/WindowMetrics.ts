/**
 * Window Metrics
 * ==============
 *
 * Peak force and impulse over a detected window.
 *
 * - Peak: max |F| over [start, end] inclusive (N)
 * - Impulse: trapezoidal integral of |F| against the actual Time values,
 *   so irregular sample spacing is honoured (N·s)
 *
 * @module analysis/WindowMetrics
 */

import { CHANNELS } from "../lib/config/analysisConfig";
import { ValidationError } from "../lib/errors";
import {
  requireNumericColumn,
  type SampleTable,
} from "../lib/parsers/sampleTable";
import type { DetectionWindow } from "./EventDetector";

export interface WindowMetrics {
  /** Full precision */
  peakForce: number;
  impulse: number;
  startTime: number;
  endTime: number;
  sampleCount: number;
  /** Rounded to 2 decimals for reporting */
  rounded: {
    peakForce: number;
    impulse: number;
  };
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Trapezoidal integral of y over x for the inclusive index range.
 */
export function trapezoidIntegral(
  y: readonly number[],
  x: readonly number[],
  startIndex: number,
  endIndex: number,
): number {
  let area = 0;
  for (let i = startIndex + 1; i <= endIndex; i++) {
    area += ((y[i] + y[i - 1]) / 2) * (x[i] - x[i - 1]);
  }
  return area;
}

export function assertValidWindow(
  table: SampleTable,
  window: DetectionWindow,
): void {
  const { startIndex, endIndex } = window;
  if (
    !Number.isInteger(startIndex) ||
    !Number.isInteger(endIndex) ||
    startIndex < 0 ||
    endIndex >= table.rowCount ||
    startIndex > endIndex
  ) {
    throw new ValidationError(
      "window",
      `Invalid window ${startIndex}-${endIndex} for ${table.rowCount} rows`,
    );
  }
}

export function computeWindowMetrics(
  table: SampleTable,
  window: DetectionWindow,
  channel: string,
): WindowMetrics {
  assertValidWindow(table, window);
  const { startIndex, endIndex } = window;

  const times = requireNumericColumn(table, CHANNELS.TIME);
  const magnitude = requireNumericColumn(table, channel).map(Math.abs);

  let peakForce = 0;
  for (let i = startIndex; i <= endIndex; i++) {
    if (magnitude[i] > peakForce) peakForce = magnitude[i];
  }
  const impulse = trapezoidIntegral(magnitude, times, startIndex, endIndex);

  return {
    peakForce,
    impulse,
    startTime: times[startIndex],
    endTime: times[endIndex],
    sampleCount: endIndex - startIndex + 1,
    rounded: {
      peakForce: roundTo(peakForce, 2),
      impulse: roundTo(impulse, 2),
    },
  };
}
