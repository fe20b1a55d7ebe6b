/**
 * Analysis Configuration
 * ======================
 *
 * Detection constants for the force-plate protocols. Everything here can be
 * overridden per session; overrides are merged onto the defaults.
 *
 * @module config/analysisConfig
 */

import { ValidationError } from "../errors";

export interface AnalysisConfig {
  /** Force-plate sampling rate (Hz) */
  samplingRate: number;
  /** Absolute force above which a sample is "loaded" (N) */
  forceThreshold: number;
  /** Quiet period at the start of a trial used as lead-foot baseline (s) */
  baselinePeriod: number;
  /** Foot contact = baseline mean + contactSdFactor × baseline SD */
  contactSdFactor: number;
  /** Tolerance when mapping a chosen time value back to a row (s) */
  timeTolerance: number;
}

export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = Object.freeze({
  samplingRate: 1000.0,
  forceThreshold: 10.0,
  baselinePeriod: 1.0,
  contactSdFactor: 5.0,
  timeTolerance: 1e-9,
});

/** Channel names produced by the CSV normalizer. */
export const CHANNELS = {
  TIME: "Time",
  AXIS_FOOT: "Force.Fy.1",
  LEAD_FOOT: "Force.Fz.2",
} as const;

const CONFIG_KEYS: readonly (keyof AnalysisConfig)[] = [
  "samplingRate",
  "forceThreshold",
  "baselinePeriod",
  "contactSdFactor",
  "timeTolerance",
];

const POSITIVE_KEYS: readonly (keyof AnalysisConfig)[] = [
  "samplingRate",
  "baselinePeriod",
  "timeTolerance",
];

/**
 * Merge overrides onto the defaults and check every value. Undefined
 * overrides fall back to the default.
 * forceThreshold and contactSdFactor may be zero; the rest must be positive.
 */
export function resolveAnalysisConfig(
  overrides: Partial<AnalysisConfig> = {},
): AnalysisConfig {
  const config: AnalysisConfig = { ...DEFAULT_ANALYSIS_CONFIG };

  for (const key of CONFIG_KEYS) {
    const value = overrides[key] ?? DEFAULT_ANALYSIS_CONFIG[key];
    if (!Number.isFinite(value)) {
      throw new ValidationError(key, `${key} must be a finite number`);
    }
    if (POSITIVE_KEYS.includes(key) ? value <= 0 : value < 0) {
      throw new ValidationError(
        key,
        `${key} must be ${POSITIVE_KEYS.includes(key) ? "positive" : "non-negative"}`,
      );
    }
    config[key] = value;
  }

  return config;
}

/** Number of leading rows used for the lead-foot baseline. */
export function baselineSampleCount(config: AnalysisConfig): number {
  return Math.trunc(config.samplingRate * config.baselinePeriod);
}
