/**
 * Error taxonomy for force-plate analysis.
 *
 * "No window found" and "operator cancelled" are not errors; the detector
 * reports them as outcomes (see analysis/EventDetector).
 */

export interface AnalysisErrorOptions {
  cause?: unknown;
}

/** Malformed or unreadable input file, or a required column is unusable. */
export class FormatError extends Error {
  constructor(
    message: string,
    public readonly sourceName?: string,
    options: AnalysisErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "FormatError";
  }
}

/** A precondition on operator input was not met. */
export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
    options: AnalysisErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "ValidationError";
  }
}

/** Writing the accumulated results to their destination failed. */
export class ExportError extends Error {
  constructor(
    public readonly destination: string,
    message: string,
    options: AnalysisErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "ExportError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}
