/**
 * Analysis Session Store
 * ======================
 *
 * Zustand store holding one operator session: subject, mode, the loaded
 * force-plate table, the single pending result and the confirmed results.
 *
 * Status per loaded file:
 *   idle → data-loaded → window-detected → result-pending → confirmed | discarded
 *
 * A new successful analysis or a new file replaces an unconfirmed result
 * without asking. "No window" and "cancelled" leave the session untouched.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import {
  detectWindow,
  type AnalysisMode,
  type DetectionOutcome,
  type StartPointResolver,
} from "../analysis/EventDetector";
import {
  createResultRecord,
  type ResultRecord,
} from "../analysis/ResultRecord";
import {
  computeWindowMetrics,
  type WindowMetrics,
} from "../analysis/WindowMetrics";
import {
  resolveAnalysisConfig,
  type AnalysisConfig,
} from "../lib/config/analysisConfig";
import { ValidationError } from "../lib/errors";
import { writeResultsFile } from "../lib/export/resultsCsv";
import { sessionLog } from "../lib/logger";
import { loadForcePlateCsv } from "../lib/parsers/forcePlateCsv";
import type { SampleTable } from "../lib/parsers/sampleTable";
import {
  buildPlotData,
  type WindowPlotData,
} from "../lib/visualization/plotData";

// ============================================================================
// TYPES
// ============================================================================

export type SessionStatus =
  | "idle"
  | "data-loaded"
  | "window-detected"
  | "result-pending"
  | "confirmed"
  | "discarded";

type WindowDetection = Extract<DetectionOutcome, { kind: "window" }>;

export interface PendingResult {
  record: ResultRecord;
  metrics: WindowMetrics;
  detection: WindowDetection;
}

export type AnalysisOutcome =
  | { kind: "result"; record: ResultRecord; metrics: WindowMetrics }
  | { kind: "no-window"; stage: "start" | "contact"; reason: string }
  | { kind: "cancelled" };

export type ResultsWriter = (
  destination: string,
  records: readonly ResultRecord[],
) => Promise<void>;

export interface AnalysisSessionState {
  subjectName: string;
  mode: AnalysisMode;
  config: AnalysisConfig;

  table: SampleTable | null;
  sourceFileName: string | null;
  status: SessionStatus;

  lastDetection: WindowDetection | null;
  pending: PendingResult | null;
  results: ResultRecord[];
  /** Number of results already written by exportResults */
  exportedCount: number;

  // Actions
  setSubjectName: (name: string) => void;
  setMode: (mode: AnalysisMode) => void;
  loadTable: (table: SampleTable) => void;
  loadFile: (filePath: string) => Promise<SampleTable>;
  runAnalysis: (resolveStartPoint?: StartPointResolver) => Promise<AnalysisOutcome>;
  confirmPending: () => ResultRecord | null;
  discardPending: () => boolean;
  exportResults: (destination: string) => Promise<number>;
  getPlotData: () => WindowPlotData | null;
  hasUnsavedWork: () => boolean;
}

export interface AnalysisSessionOptions {
  subjectName?: string;
  mode?: AnalysisMode;
  config?: Partial<AnalysisConfig>;
  writeResults?: ResultsWriter;
}

export type AnalysisSession = StoreApi<AnalysisSessionState>;

// ============================================================================
// STORE
// ============================================================================

export function createAnalysisSession(
  options: AnalysisSessionOptions = {},
): AnalysisSession {
  const config = resolveAnalysisConfig(options.config);
  const writeResults = options.writeResults ?? writeResultsFile;

  return createStore<AnalysisSessionState>()((set, get) => ({
    subjectName: options.subjectName ?? "",
    mode: options.mode ?? "LMJ",
    config,
    table: null,
    sourceFileName: null,
    status: "idle",
    lastDetection: null,
    pending: null,
    results: [],
    exportedCount: 0,

    setSubjectName: (name) => set({ subjectName: name }),

    setMode: (mode) => set({ mode }),

    loadTable: (table) => {
      if (get().pending) {
        sessionLog.debug("Unconfirmed result dropped by new file");
      }
      set({
        table,
        sourceFileName: table.sourceName,
        status: "data-loaded",
        lastDetection: null,
        pending: null,
      });
      sessionLog.info(`Loaded ${table.sourceName} (${table.rowCount} rows)`);
    },

    loadFile: async (filePath) => {
      const table = await loadForcePlateCsv(filePath);
      get().loadTable(table);
      return table;
    },

    runAnalysis: async (resolveStartPoint) => {
      const { table, mode } = get();
      const subjectName = get().subjectName.trim();

      if (!subjectName) {
        throw new ValidationError("subjectName", "Subject name is required");
      }
      if (!table) {
        throw new ValidationError(
          "table",
          "Load a force-plate file before running the analysis",
        );
      }

      const detection = await detectWindow(table, mode, {
        config: get().config,
        resolveStartPoint,
      });

      if (detection.kind === "no-window") {
        sessionLog.info(`No analysis window: ${detection.reason}`);
        return {
          kind: "no-window",
          stage: detection.stage,
          reason: detection.reason,
        };
      }
      if (detection.kind === "cancelled") {
        return { kind: "cancelled" };
      }
      if (get().table !== table) {
        sessionLog.warn("File changed during detection; result dropped");
        return { kind: "cancelled" };
      }

      set({ status: "window-detected", lastDetection: detection });

      const metrics = computeWindowMetrics(
        table,
        detection.window,
        detection.forceChannel,
      );
      const record = createResultRecord(
        subjectName,
        mode,
        table.sourceName,
        metrics,
      );

      if (get().pending) {
        sessionLog.debug("Unconfirmed result replaced by new analysis");
      }
      set({
        status: "result-pending",
        pending: { record, metrics, detection },
      });

      return { kind: "result", record, metrics };
    },

    confirmPending: () => {
      const { pending, results } = get();
      if (!pending) {
        sessionLog.warn("No pending result to add; run an analysis first");
        return null;
      }

      set({
        results: [...results, pending.record],
        pending: null,
        status: "confirmed",
      });
      sessionLog.info(`Saved results: ${results.length + 1}`);
      return pending.record;
    },

    discardPending: () => {
      if (!get().pending) return false;
      set({ pending: null, status: "discarded" });
      return true;
    },

    exportResults: async (destination) => {
      const { results } = get();
      if (results.length === 0) {
        throw new ValidationError("results", "There are no results to export");
      }

      await writeResults(destination, results);
      set({ exportedCount: results.length });
      return results.length;
    },

    getPlotData: () => {
      const { table, lastDetection } = get();
      if (!table || !lastDetection) return null;
      return buildPlotData(
        table,
        lastDetection.window,
        lastDetection.forceChannel,
        lastDetection.mode,
      );
    },

    hasUnsavedWork: () => {
      const { pending, results, exportedCount } = get();
      return pending !== null || results.length > exportedCount;
    },
  }));
}
