import type { Task } from "../lib/types.ts";
import { NotFoundError } from "../lib/errors.ts";
import type { Operation, OperationDeps } from "./types.ts";
import { check, taskIdSchema } from "./validation.ts";

export function createDeleteOperation(
  deps: Pick<OperationDeps, "store">,
): Operation<{ id: number }, number, Task> {
  const { store } = deps;

  return {
    name: "delete",

    validate(input) {
      return check(taskIdSchema, input.id);
    },

    execute(id) {
      const removed = store.remove(id);
      if (!removed) throw new NotFoundError(id);
      return removed;
    },

    describeSuccess(task) {
      return `Task '${task.title}' (ID: ${task.id}) deleted successfully!`;
    },
  };
}
