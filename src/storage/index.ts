import type { Task, TaskChanges } from "../lib/types.ts";
import type { TaskSnapshot } from "./snapshot.ts";

export type { TaskSnapshot };

/**
 * Owns the ordered task collection and the id counter. Every task handed
 * out is a copy; changes go back in through `update`.
 */
export interface TaskStore {
  add(task: Task): Task;
  remove(id: number): Task | null;
  get(id: number): Task | null;
  getAll(): Task[];
  update(id: number, changes: TaskChanges): Task | null;
  nextId(): number;
  count(): number;
  clear(): void;

  snapshot(): TaskSnapshot;
  restore(snapshot: unknown): void;
}
