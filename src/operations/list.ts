import type { StatusFilter, Task, TaskSummary } from "../lib/types.ts";
import { createChildLogger } from "../lib/logger.ts";
import type { Operation, OperationDeps } from "./types.ts";
import { statusFilterSchema } from "./validation.ts";

const log = createChildLogger("operations:list");

export function createListOperation(
  deps: Pick<OperationDeps, "store">,
): Operation<{ filter?: string }, StatusFilter | null, Task[]> {
  const { store } = deps;

  return {
    name: "list",

    // Unknown filters fall back to listing everything.
    validate(input) {
      if (input.filter === undefined) return { ok: true, value: null };
      const parsed = statusFilterSchema.safeParse(input.filter);
      if (!parsed.success) {
        log.debug({ filter: input.filter }, "Ignoring unrecognized filter");
        return { ok: true, value: null };
      }
      return { ok: true, value: parsed.data };
    },

    execute(filter) {
      const tasks = store.getAll();
      if (filter === "complete") return tasks.filter((task) => task.completed);
      if (filter === "incomplete") return tasks.filter((task) => !task.completed);
      return tasks;
    },

    describeSuccess(tasks) {
      if (tasks.length === 0) return "No tasks found. Your todo list is empty!";
      return `Total tasks: ${tasks.length}`;
    },
  };
}

export function summarizeTasks(tasks: readonly Task[]): TaskSummary {
  let complete = 0;
  for (const task of tasks) {
    if (task.completed) complete += 1;
  }
  return {
    total: tasks.length,
    complete,
    incomplete: tasks.length - complete,
  };
}
