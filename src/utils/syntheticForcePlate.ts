/**
 * Synthetic Force-Plate Data
 * ==========================
 *
 * Deterministic force-plate tables and instrument-style CSV exports for
 * tests and demos.
 */

import { CHANNELS } from "../lib/config/analysisConfig";
import type { SampleTable } from "../lib/parsers/sampleTable";

export function uniformTimes(count: number, sampleRate: number): number[] {
  return Array.from({ length: count }, (_, i) => i / sampleRate);
}

export function buildSampleTable(
  data: Record<string, number[]>,
  sourceName: string = "synthetic.csv",
): SampleTable {
  const columns = Object.keys(data);
  const rowCount = columns.length > 0 ? data[columns[0]].length : 0;
  return { columns, data, rowCount, sourceName };
}

export interface ForcePlateTrial {
  time: number[];
  axisFoot: number[];
  leadFoot: number[];
}

/** Table with Time and both force channels. */
export function buildTrialTable(
  trial: ForcePlateTrial,
  sourceName?: string,
): SampleTable {
  return buildSampleTable(
    {
      [CHANNELS.TIME]: trial.time,
      [CHANNELS.AXIS_FOOT]: trial.axisFoot,
      [CHANNELS.LEAD_FOOT]: trial.leadFoot,
    },
    sourceName,
  );
}

/**
 * Render a trial the way the instrument exports it: 4 metadata lines,
 * header, units row, then one row per sample.
 */
export function toForcePlateCsv(trial: ForcePlateTrial): string {
  const lines = [
    "Exported,Force plate",
    "Subject,Test",
    "Rate,1000",
    "Channels,2",
    "DataLabel,,FY[1],FZ[2]",
    "DataUnit,s,N,N",
  ];
  trial.time.forEach((t, i) => {
    lines.push(`${i + 1},${t},${trial.axisFoot[i]},${trial.leadFoot[i]}`);
  });
  return `${lines.join("\n")}\n`;
}

/** Constant `fill` series with the given values written at their indices. */
export function spikes(
  length: number,
  at: Record<number, number>,
  fill: number = 0,
): number[] {
  const values = new Array<number>(length).fill(fill);
  for (const [index, value] of Object.entries(at)) {
    values[Number(index)] = value;
  }
  return values;
}
