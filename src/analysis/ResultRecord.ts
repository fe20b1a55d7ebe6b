/**
 * Result Record - one confirmed analysis of one file.
 *
 * @module analysis/ResultRecord
 */

import type { AnalysisMode } from "./EventDetector";
import type { WindowMetrics } from "./WindowMetrics";

export interface ResultRecord {
  readonly subjectName: string;
  readonly mode: AnalysisMode;
  readonly sourceFileName: string;
  readonly peakForce: number; // N, 2 decimals
  readonly impulse: number; // N·s, 2 decimals
  readonly startTime: number; // s
  readonly endTime: number; // s
}

export function createResultRecord(
  subjectName: string,
  mode: AnalysisMode,
  sourceFileName: string,
  metrics: WindowMetrics,
): ResultRecord {
  return Object.freeze({
    subjectName,
    mode,
    sourceFileName,
    peakForce: metrics.rounded.peakForce,
    impulse: metrics.rounded.impulse,
    startTime: metrics.startTime,
    endTime: metrics.endTime,
  });
}

/**
 * Three-line summary shown after each analysis.
 */
export function formatResultSummary(record: ResultRecord): string {
  return [
    `Peak force : ${record.peakForce} N`,
    `Impulse    : ${record.impulse} N·s`,
    `Window     : ${record.startTime}s - ${record.endTime}s`,
  ].join("\n");
}
