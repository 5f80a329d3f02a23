import type { Task } from "../lib/types.ts";
import type { TaskStore } from "./index.ts";
import { parseSnapshot } from "./snapshot.ts";
import { applyChanges, serializeTask } from "../tasks/task.ts";
import { createChildLogger } from "../lib/logger.ts";

const log = createChildLogger("storage:memory");

export function createMemoryTaskStore(): TaskStore {
  let tasks: Task[] = [];
  let counter = 1;

  function indexOf(id: number): number {
    return tasks.findIndex((task) => task.id === id);
  }

  return {
    add(task) {
      tasks.push(serializeTask(task));
      log.debug({ taskId: task.id }, "Task stored");
      return serializeTask(task);
    },

    remove(id) {
      const index = indexOf(id);
      if (index === -1) return null;
      const [removed] = tasks.splice(index, 1);
      log.debug({ taskId: id }, "Task removed");
      return removed ? serializeTask(removed) : null;
    },

    get(id) {
      const task = tasks.find((t) => t.id === id);
      return task ? serializeTask(task) : null;
    },

    getAll() {
      return tasks.map(serializeTask);
    },

    update(id, changes) {
      const index = indexOf(id);
      const current = tasks[index];
      if (!current) return null;
      const next = applyChanges(current, changes);
      tasks[index] = next;
      return serializeTask(next);
    },

    nextId() {
      const id = counter;
      counter += 1;
      return id;
    },

    count() {
      return tasks.length;
    },

    clear() {
      tasks = [];
      counter = 1;
      log.debug("Store cleared");
    },

    snapshot() {
      return {
        tasks: tasks.map(serializeTask),
        nextId: counter,
      };
    },

    restore(input) {
      const snapshot = parseSnapshot(input);
      tasks = snapshot.tasks.map(serializeTask);
      counter = snapshot.nextId;
      log.info({ tasks: tasks.length, nextId: counter }, "Store restored");
    },
  };
}
