/**
 * Sample Table types
 */

import { FormatError } from "../errors";

/**
 * Column-oriented force-plate time series. Row i of every column belongs to
 * the same sample; non-numeric cells are NaN.
 */
export interface SampleTable {
  /** Column names in file order */
  columns: string[];
  data: Record<string, number[]>;
  rowCount: number;
  /** File name the table was read from (for reporting) */
  sourceName: string;
}

export function hasColumn(table: SampleTable, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(table.data, name);
}

/**
 * Return a numeric column, failing when it is absent or holds a value that
 * is not a finite number.
 */
export function requireNumericColumn(
  table: SampleTable,
  name: string,
): number[] {
  if (!hasColumn(table, name)) {
    throw new FormatError(
      `Required column '${name}' not found in ${table.sourceName}`,
      table.sourceName,
    );
  }

  const values = table.data[name];
  const badRow = values.findIndex((value) => !Number.isFinite(value));
  if (badRow !== -1) {
    throw new FormatError(
      `Column '${name}' has a non-numeric value at row ${badRow} of ${table.sourceName}`,
      table.sourceName,
    );
  }

  return values;
}
