/**
 * Plot payload for the display collaborator: the full series, the window
 * bounds and the channel. Nothing here renders.
 */

import { CHANNELS } from "../config/analysisConfig";
import { requireNumericColumn, type SampleTable } from "../parsers/sampleTable";
import type { AnalysisMode, DetectionWindow } from "../../analysis/EventDetector";

export interface WindowPlotData {
  title: string;
  mode: AnalysisMode;
  channel: string;
  time: number[];
  force: number[];
  window: DetectionWindow;
  startTime: number;
  endTime: number;
}

export function buildPlotData(
  table: SampleTable,
  window: DetectionWindow,
  channel: string,
  mode: AnalysisMode,
): WindowPlotData {
  const time = requireNumericColumn(table, CHANNELS.TIME);
  const force = requireNumericColumn(table, channel);

  return {
    title: `Force-time curve (${mode})`,
    mode,
    channel,
    time: [...time],
    force: [...force],
    window: { ...window },
    startTime: time[window.startIndex],
    endTime: time[window.endIndex],
  };
}
