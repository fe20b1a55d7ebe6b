/**
 * Force-Plate CSV Normalizer
 * ==========================
 *
 * Parses the force-plate instrument's CSV export into a SampleTable.
 *
 * Export layout (blank lines are skipped and not counted):
 *   lines 1-4  metadata preamble (ignored)
 *   line 5     header: DataLabel,,FY[1],FZ[2],...
 *   line 6     optional units row, first cell "DataUnit..."
 *   line 7+    samples
 *
 * The unlabeled second column is the sample time and is renamed to "Time";
 * force channels are renamed to their analysis names. Required-column checks
 * happen in the detector, not here.
 *
 * @module parsers/forcePlateCsv
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { FormatError } from "../errors";
import { parserLog } from "../logger";
import type { SampleTable } from "./sampleTable";

export const PREAMBLE_LINE_COUNT = 4;
export const UNIT_ROW_MARKER = "DataUnit";
export const LABEL_COLUMN = "DataLabel";

/** Exact-match header renames; anything else passes through unchanged. */
export const COLUMN_RENAMES: Readonly<Record<string, string>> = {
  "Unnamed: 1": "Time",
  "FY[1]": "Force.Fy.1",
  "FZ[2]": "Force.Fz.2",
};

/**
 * Split one delimited line, honouring double-quoted fields ("" escapes a
 * quote). Returns null for an unterminated quote.
 */
export function splitDelimitedLine(
  line: string,
  delimiter: string = ",",
): string[] | null {
  const cells: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === delimiter) {
      cells.push(current);
      current = "";
    } else {
      current += ch;
    }
  }

  if (inQuotes) return null;
  cells.push(current);
  return cells;
}

/**
 * Name empty header cells "Unnamed: <position>" and suffix repeated names
 * with ".1", ".2", ...
 */
export function normalizeHeaderNames(cells: string[]): string[] {
  const seen = new Map<string, number>();

  return cells.map((cell, position) => {
    const base = cell.trim() === "" ? `Unnamed: ${position}` : cell;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
}

function parseNumericCell(cell: string | undefined): number {
  if (cell === undefined) return NaN;
  const trimmed = cell.trim();
  return trimmed === "" ? NaN : Number(trimmed);
}

function splitOrThrow(
  line: string,
  lineNumber: number,
  sourceName: string,
): string[] {
  const cells = splitDelimitedLine(line);
  if (cells === null) {
    throw new FormatError(
      `Unterminated quoted field on line ${lineNumber} of ${sourceName}`,
      sourceName,
    );
  }
  return cells;
}

/** Index of the first non-blank line after the preamble, or -1. */
export function findHeaderLineIndex(lines: readonly string[]): number {
  let seen = 0;
  for (let i = 0; i < lines.length; i++) {
    if (!lines[i].trim()) continue;
    if (seen === PREAMBLE_LINE_COUNT) return i;
    seen++;
  }
  return -1;
}

/**
 * Parse raw CSV text into a SampleTable.
 * @param content Raw file content
 * @param sourceName File name (for identification and error messages)
 */
export function normalizeForcePlateCsv(
  content: string,
  sourceName: string,
): SampleTable {
  const text = content.startsWith("\uFEFF") ? content.slice(1) : content;
  const lines = text.split(/\r?\n/);

  const headerIndex = findHeaderLineIndex(lines);
  if (headerIndex === -1) {
    throw new FormatError(
      `Header row not found on line ${PREAMBLE_LINE_COUNT + 1} of ${sourceName}`,
      sourceName,
    );
  }

  const rawNames = normalizeHeaderNames(
    splitOrThrow(lines[headerIndex], headerIndex + 1, sourceName),
  );

  const rows: string[][] = [];
  for (let i = headerIndex + 1; i < lines.length; i++) {
    const line = lines[i];
    if (!line.trim()) continue;

    const cells = splitOrThrow(line, i + 1, sourceName);
    if (cells.length > rawNames.length) {
      throw new FormatError(
        `Line ${i + 1} of ${sourceName} has ${cells.length} fields, expected ${rawNames.length}`,
        sourceName,
      );
    }
    rows.push(cells);
  }

  if (rows.length > 0 && rows[0][0].startsWith(UNIT_ROW_MARKER)) {
    rows.shift();
  }

  const columns: string[] = [];
  const data: Record<string, number[]> = {};

  rawNames.forEach((rawName, position) => {
    if (rawName === LABEL_COLUMN) return;

    let name = COLUMN_RENAMES[rawName] ?? rawName;
    if (name !== rawName && rawNames.includes(name)) {
      parserLog.warn(
        `${sourceName}: '${rawName}' not renamed, column '${name}' already exists`,
      );
      name = rawName;
    }

    columns.push(name);
    data[name] = rows.map((cells) => parseNumericCell(cells[position]));
  });

  parserLog.debug(
    `${sourceName}: ${rows.length} rows, columns [${columns.join(", ")}]`,
  );

  return { columns, data, rowCount: rows.length, sourceName };
}

/**
 * Read and normalize a force-plate CSV file from disk.
 */
export async function loadForcePlateCsv(filePath: string): Promise<SampleTable> {
  const sourceName = path.basename(filePath);

  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    throw new FormatError(`Could not read ${sourceName}`, sourceName, {
      cause: error,
    });
  }

  return normalizeForcePlateCsv(content, sourceName);
}
