/**
 * tcsetup CLI - Terminal Prompter
 */

import * as readline from "readline";
import { ProvisionError, type Prompter } from "@tcsetup/engine";

function inputClosed(): ProvisionError {
  return new ProvisionError("VALIDATION_ERROR", "No answer: input closed");
}

/**
 * Reads one line per question from stdin. Once the input has ended
 * (EOF, Ctrl-D, Ctrl-C) every question rejects with VALIDATION_ERROR.
 */
export class TerminalPrompter implements Prompter {
  private ended = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
    /** Runs before each question, e.g. to pause a spinner */
    private readonly beforeAsk?: () => void,
  ) {}

  ask(question: string): Promise<string> {
    if (this.ended) return Promise.reject(inputClosed());

    this.beforeAsk?.();
    const rl = readline.createInterface({ input: this.input, output: this.output });

    return new Promise<string>((resolve, reject) => {
      let answered = false;
      rl.on("close", () => {
        if (answered) return;
        this.ended = true;
        reject(inputClosed());
      });
      rl.question(question, (answer) => {
        answered = true;
        rl.close();
        resolve(answer);
      });
    });
  }
}
