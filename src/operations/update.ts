import type { Task } from "../lib/types.ts";
import { NotFoundError } from "../lib/errors.ts";
import type { Operation, OperationDeps } from "./types.ts";
import {
  check,
  descriptionSchema,
  taskIdSchema,
  titleSchema,
} from "./validation.ts";

export interface UpdateFields {
  title?: string;
  description?: string;
}

export interface UpdateInput extends UpdateFields {
  id: number;
}

interface ParsedUpdate {
  id: number;
  changes: UpdateFields;
}

/**
 * A blank replacement title is rejected rather than skipped; callers that
 * want "keep the current title" leave `title` undefined.
 */
export function createUpdateOperation(
  deps: OperationDeps,
): Operation<UpdateInput, ParsedUpdate, Task> {
  const { store, limits } = deps;

  return {
    name: "update",

    validate(input) {
      const id = check(taskIdSchema, input.id);
      if (!id.ok) return id;

      if (input.title === undefined && input.description === undefined) {
        return { ok: false, error: "Please provide at least one field to update" };
      }

      const changes: UpdateFields = {};

      if (input.title !== undefined) {
        const title = check(titleSchema(limits.titleMaxLength), input.title);
        if (!title.ok) return title;
        changes.title = title.value;
      }

      if (input.description !== undefined) {
        const description = check(
          descriptionSchema(limits.descriptionMaxLength),
          input.description,
        );
        if (!description.ok) return description;
        changes.description = description.value;
      }

      return { ok: true, value: { id: id.value, changes } };
    },

    execute({ id, changes }) {
      const updated = store.update(id, changes);
      if (!updated) throw new NotFoundError(id);
      return updated;
    },

    describeSuccess(task) {
      return `Task (ID: ${task.id}) updated successfully!`;
    },
  };
}
