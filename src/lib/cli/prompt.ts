/**
 * Line-based operator prompts for the command line.
 *
 * One readline interface is shared by every question of a run so lines that
 * arrive together are not lost between prompts.
 */

import { createInterface, type Interface } from "node:readline";
import type {
  StartPointChoice,
  StartPointResolver,
} from "../../analysis/EventDetector";

export class PromptSession {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(
    input: NodeJS.ReadableStream,
    private readonly output: NodeJS.WritableStream,
  ) {
    this.rl = createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  write(text: string): void {
    this.output.write(text);
  }

  /** Resolves to null once input has ended. */
  async ask(question: string): Promise<string | null> {
    this.output.write(question);
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  close(): void {
    this.rl.close();
  }
}

export async function confirm(
  prompt: PromptSession,
  question: string,
): Promise<boolean> {
  const answer = await prompt.ask(`${question} [y/N] `);
  return answer !== null && /^y(es)?$/i.test(answer.trim());
}

/**
 * Lists the candidates and asks for a 1-based number. Blank input, "q" or
 * end of input cancel.
 */
export function createPromptStartPointResolver(
  prompt: PromptSession,
): StartPointResolver {
  return async (candidates): Promise<StartPointChoice> => {
    prompt.write(
      `${candidates.length} start-point candidates found. Choose the start time (s):\n`,
    );
    candidates.forEach((candidate, i) => {
      prompt.write(`  ${i + 1}) ${candidate.label}\n`);
    });

    for (;;) {
      const answer = await prompt.ask(
        `Candidate [1-${candidates.length}, blank to cancel]: `,
      );
      if (answer === null) return { kind: "cancelled" };

      const text = answer.trim();
      if (text === "" || text.toLowerCase() === "q") {
        return { kind: "cancelled" };
      }

      const position = Number(text);
      const candidate = Number.isInteger(position)
        ? candidates[position - 1]
        : undefined;
      if (candidate) return { kind: "selected", time: candidate.time };

      prompt.write(`'${text}' is not one of the listed candidates\n`);
    }
  };
}
