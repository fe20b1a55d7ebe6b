/**
 * Command-line driver: load each file, analyse it, show the result, ask to
 * keep it, then export everything that was kept.
 */

import { createRuleResolver } from "../../analysis/startPointResolvers";
import { formatResultSummary } from "../../analysis/ResultRecord";
import {
  createAnalysisSession,
  type ResultsWriter,
} from "../../store/analysisSession";
import {
  ExportError,
  FormatError,
  ValidationError,
  describeError,
} from "../errors";
import { log } from "../logger";
import { USAGE, parseCliArgs } from "./args";
import { PromptSession, confirm, createPromptStartPointResolver } from "./prompt";

export interface CliIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  writeResults?: ResultsWriter;
}

const cliLog = log.child("CLI");

/** Returns the process exit code. */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const options = parseCliArgs(argv);
  if (options.help) {
    io.output.write(USAGE);
    return 0;
  }
  if (options.files.length === 0) {
    io.output.write(USAGE);
    return 2;
  }
  if (!options.subject.trim()) {
    cliLog.error("Subject name is required (--subject NAME)");
    io.output.write(USAGE);
    return 2;
  }

  const session = createAnalysisSession({
    subjectName: options.subject,
    mode: options.mode,
    config: options.config,
    writeResults: io.writeResults,
  });
  const prompt = new PromptSession(io.input, io.output);
  const resolveStartPoint = options.startRule
    ? createRuleResolver(options.startRule)
    : createPromptStartPointResolver(prompt);

  try {
    for (const file of options.files) {
      try {
        await session.getState().loadFile(file);
      } catch (error) {
        if (!(error instanceof FormatError)) throw error;
        cliLog.error(`File load failed: ${describeError(error)}`);
        continue;
      }

      const state = session.getState();
      const outcome = await state
        .runAnalysis(resolveStartPoint)
        .catch((error: unknown) => {
          // The file is skipped; results confirmed so far stay in the session
          if (
            !(error instanceof FormatError || error instanceof ValidationError)
          ) {
            throw error;
          }
          cliLog.error(`${state.sourceFileName}: ${describeError(error)}`);
          return null;
        });
      if (outcome === null) continue;

      io.output.write(`\n== ${state.sourceFileName} (${state.mode})\n`);
      if (outcome.kind === "no-window") {
        io.output.write(`No analysis window found: ${outcome.reason}\n`);
        continue;
      }
      if (outcome.kind === "cancelled") {
        io.output.write("Analysis cancelled\n");
        continue;
      }

      io.output.write(`${formatResultSummary(outcome.record)}\n`);
      const keep =
        options.assumeYes ||
        (await confirm(prompt, "Add this result to the list?"));
      if (keep) {
        state.confirmPending();
      } else {
        state.discardPending();
      }
    }
  } finally {
    prompt.close();
  }

  const { results } = session.getState();
  io.output.write(`\nSaved: ${results.length}\n`);

  if (options.out && results.length > 0) {
    try {
      const count = await session.getState().exportResults(options.out);
      io.output.write(`Exported ${count} results to ${options.out}\n`);
    } catch (error) {
      if (!(error instanceof ExportError)) throw error;
      cliLog.error(describeError(error));
      return 1;
    }
  } else if (session.getState().hasUnsavedWork()) {
    cliLog.warn("Saved results were not exported (use --out FILE)");
  }

  return 0;
}
