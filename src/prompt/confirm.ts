import { createInterface } from "node:readline";
import type { Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";

/** One line of operator input per question. */
export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export class InputClosedError extends Error {
  constructor() {
    super("Input closed before an answer was given");
    this.name = "InputClosedError";
  }
}

/**
 * Reads answers from a terminal. Blocks until the operator presses enter; there is no timeout.
 * Once the input ends, a pending question and every later one reject with {@link InputClosedError}.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private closed = false;

  constructor(input: Readable = process.stdin, output: Writable = process.stdout) {
    this.rl = createInterface({ input, output });
    this.rl.once("close", () => {
      this.closed = true;
    });
  }

  ask(question: string): Promise<string> {
    if (this.closed) return Promise.reject(new InputClosedError());

    return new Promise<string>((resolve, reject) => {
      const onClose = (): void => reject(new InputClosedError());
      this.rl.once("close", onClose);
      // The callback runs on the line event itself, so an answer followed at once by end of input still counts.
      this.rl.question(question, (answer) => {
        this.rl.off("close", onClose);
        resolve(answer);
      });
    });
  }

  close(): void {
    this.rl.close();
  }
}

/** Yes only for an answer starting with y or Y; empty and anything else is no. */
export function parseYesNo(answer: string): boolean {
  return /^y/i.test(answer.trim());
}

export async function askYesNo(prompter: Prompter, question: string): Promise<boolean> {
  return parseYesNo(await prompter.ask(`${question} [y/N]: `));
}
