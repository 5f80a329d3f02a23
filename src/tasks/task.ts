import type { Task, TaskChanges } from "../lib/types.ts";

export function createTask(opts: {
  id: number;
  title: string;
  description?: string;
}): Task {
  return {
    id: opts.id,
    title: opts.title,
    description: opts.description ?? "",
    completed: false,
  };
}

/** Returns a new task with the provided fields replaced; the id never changes. */
export function applyChanges(task: Task, changes: TaskChanges): Task {
  return {
    id: task.id,
    title: changes.title ?? task.title,
    description: changes.description ?? task.description,
    completed: changes.completed ?? task.completed,
  };
}

/**
 * Stable public shape for serializers: exactly these four fields, in this
 * order, whatever else a task object happens to carry.
 */
export function serializeTask(task: Task): Task {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    completed: task.completed,
  };
}

export function formatTask(task: Task): string {
  return [
    `ID: ${task.id}`,
    `Title: ${task.title}`,
    `Description: ${task.description}`,
    `Status: ${task.completed ? "Complete" : "Incomplete"}`,
  ].join("\n");
}
