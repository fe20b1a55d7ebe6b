/**
 * Pre-supplied start-point rules for non-interactive runs.
 */

import { ValidationError } from "../lib/errors";
import type { StartCandidate, StartPointChoice, StartPointResolver } from "./EventDetector";

export type StartPointRule =
  | { kind: "first" }
  | { kind: "last" }
  /** 1-based position in the candidate list */
  | { kind: "nth"; position: number }
  | { kind: "cancel" };

export function parseStartPointRule(text: string): StartPointRule {
  const normalized = text.trim().toLowerCase();
  if (normalized === "first") return { kind: "first" };
  if (normalized === "last") return { kind: "last" };
  if (normalized === "cancel") return { kind: "cancel" };

  const position = Number(normalized);
  if (normalized !== "" && Number.isInteger(position) && position >= 1) {
    return { kind: "nth", position };
  }

  throw new ValidationError(
    "start",
    `Unknown start-point rule '${text}' (expected first, last, cancel or a 1-based number)`,
  );
}

export function chooseByRule(
  candidates: StartCandidate[],
  rule: StartPointRule,
): StartPointChoice {
  let candidate: StartCandidate | undefined;
  switch (rule.kind) {
    case "cancel":
      return { kind: "cancelled" };
    case "first":
      candidate = candidates[0];
      break;
    case "last":
      candidate = candidates[candidates.length - 1];
      break;
    case "nth":
      candidate = candidates[rule.position - 1];
      break;
  }

  if (!candidate) {
    throw new ValidationError(
      "start",
      `Start-point rule cannot pick from ${candidates.length} candidates`,
    );
  }
  return { kind: "selected", time: candidate.time };
}

export function createRuleResolver(rule: StartPointRule): StartPointResolver {
  return (candidates) => chooseByRule(candidates, rule);
}
