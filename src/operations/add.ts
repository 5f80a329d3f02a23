import type { Task } from "../lib/types.ts";
import { createTask } from "../tasks/task.ts";
import type { Operation, OperationDeps } from "./types.ts";
import { check, descriptionSchema, titleSchema } from "./validation.ts";

export interface AddInput {
  title: string;
  description?: string;
}

export function createAddOperation(
  deps: OperationDeps,
): Operation<AddInput, Required<AddInput>, Task> {
  const { store, limits } = deps;

  return {
    name: "add",

    validate(input) {
      const title = check(titleSchema(limits.titleMaxLength), input.title);
      if (!title.ok) return title;

      const description = check(
        descriptionSchema(limits.descriptionMaxLength),
        input.description ?? "",
      );
      if (!description.ok) return description;

      return {
        ok: true,
        value: { title: title.value, description: description.value },
      };
    },

    execute({ title, description }) {
      const task = createTask({ id: store.nextId(), title, description });
      return store.add(task);
    },

    describeSuccess(task) {
      return `Task added successfully! (ID: ${task.id})`;
    },
  };
}
