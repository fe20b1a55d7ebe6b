import { parseArgs } from "node:util";
import {
  isAnalysisMode,
  type AnalysisMode,
} from "../../analysis/EventDetector";
import {
  parseStartPointRule,
  type StartPointRule,
} from "../../analysis/startPointResolvers";
import type { AnalysisConfig } from "../config/analysisConfig";
import { ValidationError } from "../errors";

export interface CliOptions {
  subject: string;
  mode: AnalysisMode;
  files: string[];
  startRule: StartPointRule | null;
  out: string | null;
  assumeYes: boolean;
  config: Partial<AnalysisConfig>;
  help: boolean;
}

export const USAGE = `Usage: analyze-force-plate --subject NAME [options] FILE...

Options:
  -s, --subject NAME       Subject name (required)
  -m, --mode MODE          LMJ or Throwing (default: LMJ)
      --start RULE         Pick Throwing start candidates without prompting:
                           first, last, cancel or a 1-based number
  -o, --out FILE           Write confirmed results to FILE (CSV)
  -y, --yes                Add every result without asking
      --sampling-rate HZ   Sampling rate (default 1000)
      --threshold N        Force threshold (default 10)
      --baseline S         Baseline period (default 1)
      --sd-factor K        Contact SD factor (default 5)
  -h, --help               Show this help
`;

function parseNumberOption(
  name: string,
  value: string | undefined,
): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new ValidationError(name, `--${name} expects a number, got '${value}'`);
  }
  return parsed;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        subject: { type: "string", short: "s" },
        mode: { type: "string", short: "m" },
        start: { type: "string" },
        out: { type: "string", short: "o" },
        yes: { type: "boolean", short: "y" },
        "sampling-rate": { type: "string" },
        threshold: { type: "string" },
        baseline: { type: "string" },
        "sd-factor": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw new ValidationError(
      "arguments",
      error instanceof Error ? error.message : String(error),
      { cause: error },
    );
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = readArgs(argv);

  const mode = values.mode ?? "LMJ";
  if (!isAnalysisMode(mode)) {
    throw new ValidationError("mode", `Unknown mode '${mode}' (expected LMJ or Throwing)`);
  }

  return {
    subject: values.subject ?? "",
    mode,
    files: positionals,
    startRule: values.start === undefined ? null : parseStartPointRule(values.start),
    out: values.out ?? null,
    assumeYes: values.yes ?? false,
    config: {
      samplingRate: parseNumberOption("sampling-rate", values["sampling-rate"]),
      forceThreshold: parseNumberOption("threshold", values.threshold),
      baselinePeriod: parseNumberOption("baseline", values.baseline),
      contactSdFactor: parseNumberOption("sd-factor", values["sd-factor"]),
    },
    help: values.help ?? false,
  };
}
