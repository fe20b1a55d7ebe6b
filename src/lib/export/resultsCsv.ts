/**
 * Results Export
 * ==============
 *
 * Flattens the accumulated ResultRecords into a spreadsheet-compatible CSV
 * table, one row per record, and writes it to disk.
 *
 * @module export/resultsCsv
 */

import { writeFile } from "node:fs/promises";
import type { ResultRecord } from "../../analysis/ResultRecord";
import { ExportError } from "../errors";
import { exportLog } from "../logger";

export const RESULT_COLUMNS = [
  "subjectName",
  "mode",
  "sourceFileName",
  "peakForce",
  "impulse",
  "startTime",
  "endTime",
] as const;

export type ResultColumn = (typeof RESULT_COLUMNS)[number];

export type ResultRow = Record<ResultColumn, string | number>;

export function toResultRows(records: readonly ResultRecord[]): ResultRow[] {
  return records.map((record) => ({
    subjectName: record.subjectName,
    mode: record.mode,
    sourceFileName: record.sourceFileName,
    peakForce: record.peakForce,
    impulse: record.impulse,
    startTime: record.startTime,
    endTime: record.endTime,
  }));
}

/** Quote a cell when it contains a delimiter, quote or line break. */
export function escapeCsvCell(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function serializeResultsCsv(records: readonly ResultRecord[]): string {
  const lines: string[] = [RESULT_COLUMNS.join(",")];
  for (const row of toResultRows(records)) {
    lines.push(RESULT_COLUMNS.map((column) => escapeCsvCell(row[column])).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export async function writeResultsFile(
  destination: string,
  records: readonly ResultRecord[],
): Promise<void> {
  const content = serializeResultsCsv(records);
  try {
    await writeFile(destination, content, "utf8");
  } catch (error) {
    throw new ExportError(
      destination,
      `Failed to write results to ${destination}`,
      { cause: error },
    );
  }
  exportLog.info(`Wrote ${records.length} results to ${destination}`);
}
