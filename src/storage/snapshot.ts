import { z } from "zod";
import { InvalidInputError } from "../lib/errors.ts";

const taskSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  description: z.string(),
  completed: z.boolean(),
});

export const snapshotSchema = z.object({
  tasks: z.array(taskSchema),
  nextId: z.number().int().positive(),
});

export type TaskSnapshot = z.infer<typeof snapshotSchema>;

export function parseSnapshot(input: unknown): TaskSnapshot {
  const parsed = snapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError("Malformed task snapshot", parsed.error);
  }

  const snapshot = parsed.data;
  const seen = new Set<number>();
  for (const task of snapshot.tasks) {
    if (seen.has(task.id)) {
      throw new InvalidInputError(`Duplicate task ID ${task.id} in snapshot`);
    }
    if (task.id >= snapshot.nextId) {
      throw new InvalidInputError(
        `Snapshot counter ${snapshot.nextId} would reuse task ID ${task.id}`,
      );
    }
    seen.add(task.id);
  }

  return snapshot;
}
