import type { Task } from "../lib/types.ts";
import { NotFoundError } from "../lib/errors.ts";
import type { Operation, OperationDeps } from "./types.ts";
import { check, markAsSchema, taskIdSchema } from "./validation.ts";

export interface ToggleInput {
  id: number;
  markAs?: boolean;
}

interface ParsedToggle {
  id: number;
  markAs: boolean | undefined;
}

export function createToggleOperation(
  deps: Pick<OperationDeps, "store">,
): Operation<ToggleInput, ParsedToggle, Task> {
  const { store } = deps;

  return {
    name: "toggle",

    validate(input) {
      const id = check(taskIdSchema, input.id);
      if (!id.ok) return id;

      const markAs = check(markAsSchema, input.markAs);
      if (!markAs.ok) return markAs;

      return { ok: true, value: { id: id.value, markAs: markAs.value } };
    },

    execute({ id, markAs }) {
      const current = store.get(id);
      if (!current) throw new NotFoundError(id);
      const updated = store.update(id, {
        completed: markAs ?? !current.completed,
      });
      if (!updated) throw new NotFoundError(id);
      return updated;
    },

    describeSuccess(task) {
      const status = task.completed ? "complete" : "incomplete";
      return `Task '${task.title}' (ID: ${task.id}) marked as ${status}!`;
    },
  };
}
