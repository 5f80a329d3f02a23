import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { InputClosedError } from "../lib/errors.ts";

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Line-at-a-time prompts over any readable stream. Lines that arrive before
 * they are asked for stay buffered, so piped input works the same as a TTY.
 */
export function createPrompter(opts: {
  input: Readable;
  output: Writable;
}): Prompter {
  const rl = createInterface({ input: opts.input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question) {
      opts.output.write(question);
      const next = await lines.next();
      if (next.done) throw new InputClosedError();
      return next.value;
    },

    close() {
      rl.close();
    },
  };
}
