import { describe, it, expect, beforeEach } from "vitest";
import { createMemoryTaskStore } from "../../src/storage/memory.ts";
import { createOperationSet } from "../../src/operations/index.ts";
import type { OperationSet } from "../../src/operations/index.ts";
import type { TaskStore } from "../../src/storage/index.ts";

describe("delete", () => {
  let store: TaskStore;
  let ops: OperationSet;

  beforeEach(() => {
    store = createMemoryTaskStore();
    ops = createOperationSet({ store });
  });

  it("removes the task and returns it", () => {
    ops.add("A");
    const result = ops.delete(1);
    expect(result).toEqual({
      ok: true,
      value: { id: 1, title: "A", description: "", completed: false },
      message: "Task 'A' (ID: 1) deleted successfully!",
    });
    expect(store.get(1)).toBeNull();
    expect(store.count()).toBe(0);
  });

  it("never reuses a deleted id", () => {
    ops.add("A");
    ops.delete(1);
    const result = ops.add("B");
    expect(result.ok && result.value.id).toBe(2);
  });

  it("reports a missing id", () => {
    expect(ops.delete(7)).toEqual({
      ok: false,
      error: "Task with ID 7 not found",
      code: "NOT_FOUND",
    });
  });

  it.each([
    [0, "Task ID must be positive"],
    [-3, "Task ID must be positive"],
    [1.5, "Task ID must be an integer"],
    [Number.NaN, "Task ID must be an integer"],
  ])("rejects id %s", (id, error) => {
    ops.add("A");
    expect(ops.delete(id)).toEqual({ ok: false, error, code: "INVALID_INPUT" });
    expect(store.count()).toBe(1);
  });
});
