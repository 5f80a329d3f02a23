import type { OperationResult, Task } from "../lib/types.ts";
import type { OperationSet } from "../operations/index.ts";
import type { Formatter } from "./formatter.ts";
import type { Prompter } from "./prompt.ts";
import { blankToUndefined, parseTaskId } from "./input.ts";

export type MenuOutcome = "continue" | "exit";

export interface MenuHandler {
  (): Promise<MenuOutcome>;
}

export function createMenuHandlers(opts: {
  operations: OperationSet;
  prompter: Prompter;
  formatter: Formatter;
  print: (text: string) => void;
}): Map<string, MenuHandler> {
  const { operations, prompter, formatter, print } = opts;

  function report(result: OperationResult<Task>, showTask = false): void {
    if (!result.ok) {
      print(formatter.error(result.error));
      return;
    }
    print(formatter.success(result.message));
    if (showTask) print(formatter.task(result.value));
  }

  async function askTaskId(question: string): Promise<number | null> {
    const id = parseTaskId(await prompter.ask(question));
    if (id === null) print(formatter.error("Please enter a valid number."));
    return id;
  }

  return new Map<string, MenuHandler>([
    [
      "1",
      async () => {
        print(formatter.heading("ADD NEW TASK"));
        const title = await prompter.ask("Enter task title: ");
        const description = await prompter.ask(
          "Enter task description (optional): ",
        );
        report(operations.add(title, description));
        return "continue";
      },
    ],
    [
      "2",
      async () => {
        print(formatter.heading("ALL TASKS"));
        const filter = await prompter.ask(
          "Filter by status (complete/incomplete, Enter for all): ",
        );
        const result = operations.list(blankToUndefined(filter));
        if (result.ok) {
          print(formatter.taskList(result.value, result.message));
        } else {
          print(formatter.error(result.error));
        }
        return "continue";
      },
    ],
    [
      "3",
      async () => {
        print(formatter.heading("UPDATE TASK"));
        const id = await askTaskId("Enter task ID to update: ");
        if (id === null) return "continue";
        print(formatter.info("Leave blank to keep current value."));
        const title = await prompter.ask(
          "Enter new title (or press Enter to skip): ",
        );
        const description = await prompter.ask(
          "Enter new description (or press Enter to skip): ",
        );
        report(
          operations.update(id, {
            title: blankToUndefined(title),
            description: blankToUndefined(description),
          }),
          true,
        );
        return "continue";
      },
    ],
    [
      "4",
      async () => {
        print(formatter.heading("DELETE TASK"));
        const id = await askTaskId("Enter task ID to delete: ");
        if (id !== null) report(operations.delete(id));
        return "continue";
      },
    ],
    [
      "5",
      async () => {
        print(formatter.heading("MARK TASK COMPLETE/INCOMPLETE"));
        const id = await askTaskId("Enter task ID: ");
        if (id !== null) report(operations.toggle(id));
        return "continue";
      },
    ],
    [
      "6",
      async () => {
        print(formatter.summary(operations.summary()));
        return "continue";
      },
    ],
    [
      "7",
      async () => {
        print(formatter.goodbye());
        return "exit";
      },
    ],
  ]);
}
