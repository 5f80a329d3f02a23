import type { Readable, Writable } from "node:stream";
import type { OperationSet } from "../operations/index.ts";
import { InputClosedError } from "../lib/errors.ts";
import { createChildLogger } from "../lib/logger.ts";
import { createFormatter, MENU_OPTIONS } from "./formatter.ts";
import { createMenuHandlers } from "./handlers.ts";
import { createPrompter } from "./prompt.ts";

const log = createChildLogger("cli");

export async function runCli(opts: {
  operations: OperationSet;
  input: Readable;
  output: Writable;
  color: boolean;
}): Promise<void> {
  const { operations, input, output, color } = opts;
  const formatter = createFormatter({ color });
  const prompter = createPrompter({ input, output });
  const print = (text: string) => {
    output.write(`${text}\n`);
  };
  const handlers = createMenuHandlers({ operations, prompter, formatter, print });
  const last = MENU_OPTIONS.length;

  print(formatter.banner());

  try {
    for (;;) {
      print(formatter.menu());
      const choice = (await prompter.ask(`\nEnter your choice (1-${last}): `)).trim();
      const handler = handlers.get(choice);

      if (!handler) {
        print(
          formatter.error(`Invalid choice. Please enter a number between 1 and ${last}.`),
        );
        continue;
      }

      if ((await handler()) === "exit") break;
    }
  } catch (err) {
    if (!(err instanceof InputClosedError)) throw err;
    log.info("Input closed, leaving menu");
  } finally {
    prompter.close();
  }
}
