import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ResultRecord } from "../../analysis/ResultRecord";
import { ExportError } from "../errors";
import {
  escapeCsvCell,
  serializeResultsCsv,
  toResultRows,
  writeResultsFile,
} from "./resultsCsv";

const RECORDS: ResultRecord[] = [
  {
    subjectName: "Sato",
    mode: "LMJ",
    sourceFileName: "trial1.csv",
    peakForce: 152.3,
    impulse: 12.5,
    startTime: 0.12,
    endTime: 0.845,
  },
  {
    subjectName: 'Lee, "J"',
    mode: "Throwing",
    sourceFileName: "t2.csv",
    peakForce: 80,
    impulse: 3.25,
    startTime: 1.2,
    endTime: 2.5,
  },
];

describe("resultsCsv", () => {
  it("flattens records into rows with the export columns", () => {
    expect(Object.keys(toResultRows(RECORDS)[0])).toEqual([
      "subjectName",
      "mode",
      "sourceFileName",
      "peakForce",
      "impulse",
      "startTime",
      "endTime",
    ]);
  });

  it("serializes one line per record after the header", () => {
    expect(serializeResultsCsv(RECORDS)).toBe(
      [
        "subjectName,mode,sourceFileName,peakForce,impulse,startTime,endTime",
        "Sato,LMJ,trial1.csv,152.3,12.5,0.12,0.845",
        '"Lee, ""J""",Throwing,t2.csv,80,3.25,1.2,2.5',
        "",
      ].join("\n"),
    );
  });

  it("writes only the header for an empty collection", () => {
    expect(serializeResultsCsv([])).toBe(
      "subjectName,mode,sourceFileName,peakForce,impulse,startTime,endTime\n",
    );
  });

  it("quotes cells with delimiters or line breaks", () => {
    expect(escapeCsvCell("plain")).toBe("plain");
    expect(escapeCsvCell("two\nlines")).toBe('"two\nlines"');
    expect(escapeCsvCell(1.5)).toBe("1.5");
  });

  describe("writeResultsFile", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), "forceplate-export-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("writes the serialized table", async () => {
      const destination = path.join(dir, "results.csv");

      await writeResultsFile(destination, RECORDS);

      expect(await readFile(destination, "utf8")).toBe(
        serializeResultsCsv(RECORDS),
      );
    });

    it("wraps write failures in an ExportError", async () => {
      const destination = path.join(dir, "missing-dir", "results.csv");

      const error = await writeResultsFile(destination, RECORDS).catch(
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(ExportError);
      expect(error).toHaveProperty("destination", destination);
      expect(error).toHaveProperty("cause.code", "ENOENT");
    });
  });
});
