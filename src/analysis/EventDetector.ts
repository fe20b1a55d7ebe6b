/**
 * Event Detector - Force-Plate Analysis Windows
 * ==============================================
 *
 * Locates the start/end samples of the analysis window for each protocol.
 *
 * LMJ:
 * - Envelope of every sample whose |Fy| exceeds the force threshold.
 *   Sub-threshold dips inside the envelope are kept; this is not a
 *   peak finder.
 *
 * Throwing:
 * - Start: a sample where |axis-foot force| exceeds the force threshold.
 *   Several candidates are handed to a start-point resolver (operator
 *   prompt or batch rule), which may cancel.
 * - End (lead-foot contact): first raw lead-foot sample at or after the
 *   start that exceeds mean + k·SD of the quiet baseline at the beginning
 *   of the trial (sample SD, N-1).
 *
 * "No window" and "cancelled" are normal outcomes, returned rather than
 * thrown.
 *
 * @module analysis/EventDetector
 */

import {
  CHANNELS,
  DEFAULT_ANALYSIS_CONFIG,
  baselineSampleCount,
  type AnalysisConfig,
} from "../lib/config/analysisConfig";
import { ValidationError } from "../lib/errors";
import { detectLog } from "../lib/logger";
import {
  requireNumericColumn,
  type SampleTable,
} from "../lib/parsers/sampleTable";

// ============================================================================
// TYPES
// ============================================================================

export type AnalysisMode = "LMJ" | "Throwing";

export const ANALYSIS_MODES: readonly AnalysisMode[] = ["LMJ", "Throwing"];

export function isAnalysisMode(value: string): value is AnalysisMode {
  return ANALYSIS_MODES.some((mode) => mode === value);
}

/** Inclusive row range into a SampleTable. */
export interface DetectionWindow {
  startIndex: number;
  endIndex: number;
}

export interface StartCandidate {
  /** Row index in the table */
  index: number;
  /** Time value of the row (s) */
  time: number;
  /** Time formatted for display (4 decimals) */
  label: string;
}

export type StartPointChoice =
  | { kind: "selected"; time: number }
  | { kind: "cancelled" };

/**
 * Picks one start candidate or cancels. Called only when there is more
 * than one candidate; may wait indefinitely on an operator.
 */
export type StartPointResolver = (
  candidates: StartCandidate[],
) => StartPointChoice | Promise<StartPointChoice>;

export interface ContactBaseline {
  mean: number;
  sd: number;
  sampleCount: number;
  /** mean + contactSdFactor × sd */
  threshold: number;
}

export type DetectionOutcome =
  | {
      kind: "window";
      mode: AnalysisMode;
      window: DetectionWindow;
      /** Channel the metrics are computed on */
      forceChannel: string;
      /** Number of above-threshold start candidates */
      candidateCount: number;
      /** Lead-foot baseline (Throwing only) */
      baseline?: ContactBaseline;
    }
  | {
      kind: "no-window";
      mode: AnalysisMode;
      stage: "start" | "contact";
      reason: string;
    }
  | { kind: "cancelled"; mode: AnalysisMode };

export interface DetectOptions {
  config?: AnalysisConfig;
  resolveStartPoint?: StartPointResolver;
}

/**
 * Peak/impulse channel per mode. Throwing uses the axis foot even though
 * the lead foot ends the window.
 */
export const METRIC_CHANNEL: Readonly<Record<AnalysisMode, string>> = {
  LMJ: CHANNELS.AXIS_FOOT,
  Throwing: CHANNELS.AXIS_FOOT,
};

// ============================================================================
// SIGNAL HELPERS
// ============================================================================

/**
 * Indices where |value| (or the raw value) is strictly above threshold.
 */
export function findThresholdCrossings(
  values: readonly number[],
  threshold: number,
  absolute: boolean = true,
): number[] {
  const indices: number[] = [];
  for (let i = 0; i < values.length; i++) {
    const v = absolute ? Math.abs(values[i]) : values[i];
    if (v > threshold) indices.push(i);
  }
  return indices;
}

/**
 * Mean and sample standard deviation of the first `count` values (or all
 * of them when there are fewer). SD is NaN below two samples.
 */
export function computeBaseline(
  values: readonly number[],
  count: number,
): { mean: number; sd: number; sampleCount: number } {
  const n = Math.max(0, Math.min(count, values.length));
  if (n === 0) return { mean: NaN, sd: NaN, sampleCount: 0 };

  let sum = 0;
  for (let i = 0; i < n; i++) sum += values[i];
  const mean = sum / n;

  if (n < 2) return { mean, sd: NaN, sampleCount: n };

  let sumSq = 0;
  for (let i = 0; i < n; i++) sumSq += (values[i] - mean) ** 2;
  return { mean, sd: Math.sqrt(sumSq / (n - 1)), sampleCount: n };
}

/** First index >= fromIndex whose raw value exceeds threshold, or -1. */
export function findFirstAbove(
  values: readonly number[],
  threshold: number,
  fromIndex: number,
): number {
  for (let i = Math.max(0, fromIndex); i < values.length; i++) {
    if (values[i] > threshold) return i;
  }
  return -1;
}

/**
 * First candidate row whose time lies within tolerance of `chosen`, or -1.
 * Rows outside `candidates` never match.
 */
export function candidateForTime(
  candidates: readonly number[],
  times: readonly number[],
  chosen: number,
  tolerance: number,
): number {
  const match = candidates.find((i) => Math.abs(times[i] - chosen) < tolerance);
  return match ?? -1;
}

export function formatCandidateTime(time: number): string {
  return time.toFixed(4);
}

// ============================================================================
// LMJ
// ============================================================================

export function detectLmjWindow(
  table: SampleTable,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
): DetectionOutcome {
  requireNumericColumn(table, CHANNELS.TIME);
  const force = requireNumericColumn(table, CHANNELS.AXIS_FOOT);

  const candidates = findThresholdCrossings(force, config.forceThreshold);
  if (candidates.length === 0) {
    return {
      kind: "no-window",
      mode: "LMJ",
      stage: "start",
      reason: `No sample of ${CHANNELS.AXIS_FOOT} exceeds ${config.forceThreshold} N`,
    };
  }

  const window: DetectionWindow = {
    startIndex: candidates[0],
    endIndex: candidates[candidates.length - 1],
  };
  detectLog.debug(
    `LMJ window ${window.startIndex}-${window.endIndex} (${candidates.length} samples above threshold)`,
  );

  return {
    kind: "window",
    mode: "LMJ",
    window,
    forceChannel: METRIC_CHANNEL.LMJ,
    candidateCount: candidates.length,
  };
}

// ============================================================================
// THROWING
// ============================================================================

async function resolveStartIndex(
  candidates: number[],
  times: readonly number[],
  config: AnalysisConfig,
  resolver: StartPointResolver | undefined,
): Promise<number | null> {
  if (candidates.length === 1) return candidates[0];

  if (!resolver) {
    throw new ValidationError(
      "resolveStartPoint",
      `${candidates.length} start candidates found but no start-point resolver was supplied`,
    );
  }

  const choice = await resolver(
    candidates.map((index) => ({
      index,
      time: times[index],
      label: formatCandidateTime(times[index]),
    })),
  );
  if (choice.kind === "cancelled") return null;

  const index = candidateForTime(
    candidates,
    times,
    choice.time,
    config.timeTolerance,
  );
  if (index === -1) {
    throw new ValidationError(
      "startTime",
      `Selected start time ${choice.time} is not one of the start candidates`,
    );
  }
  return index;
}

export async function detectThrowingWindow(
  table: SampleTable,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
  resolveStartPoint?: StartPointResolver,
): Promise<DetectionOutcome> {
  const axis = requireNumericColumn(table, CHANNELS.AXIS_FOOT);
  const lead = requireNumericColumn(table, CHANNELS.LEAD_FOOT);
  const times = requireNumericColumn(table, CHANNELS.TIME);

  // --- Start point ---
  const candidates = findThresholdCrossings(axis, config.forceThreshold);
  if (candidates.length === 0) {
    return {
      kind: "no-window",
      mode: "Throwing",
      stage: "start",
      reason: `No sample of ${CHANNELS.AXIS_FOOT} exceeds ${config.forceThreshold} N`,
    };
  }

  const startIndex = await resolveStartIndex(
    candidates,
    times,
    config,
    resolveStartPoint,
  );
  if (startIndex === null) {
    detectLog.info("Start-point selection cancelled");
    return { kind: "cancelled", mode: "Throwing" };
  }

  // --- End point (lead-foot contact) ---
  const stats = computeBaseline(lead, baselineSampleCount(config));
  const baseline: ContactBaseline = {
    ...stats,
    threshold: stats.mean + config.contactSdFactor * stats.sd,
  };

  // The start sample itself may already be the contact
  const endIndex = findFirstAbove(lead, baseline.threshold, startIndex);
  if (endIndex === -1) {
    return {
      kind: "no-window",
      mode: "Throwing",
      stage: "contact",
      reason: `No lead-foot contact above ${baseline.threshold.toFixed(2)} N after t=${formatCandidateTime(times[startIndex])} s`,
    };
  }

  detectLog.debug(
    `Throwing window ${startIndex}-${endIndex}; baseline mean=${baseline.mean.toFixed(3)} sd=${baseline.sd.toFixed(3)} over ${baseline.sampleCount} samples`,
  );

  return {
    kind: "window",
    mode: "Throwing",
    window: { startIndex, endIndex },
    forceChannel: METRIC_CHANNEL.Throwing,
    candidateCount: candidates.length,
    baseline,
  };
}

// ============================================================================
// ENTRY POINT
// ============================================================================

export async function detectWindow(
  table: SampleTable,
  mode: AnalysisMode,
  options: DetectOptions = {},
): Promise<DetectionOutcome> {
  const config = options.config ?? DEFAULT_ANALYSIS_CONFIG;

  switch (mode) {
    case "LMJ":
      return detectLmjWindow(table, config);
    case "Throwing":
      return detectThrowingWindow(table, config, options.resolveStartPoint);
  }
}
