import { describe, it, expect, beforeEach } from "vitest";
import { createMemoryTaskStore } from "../../src/storage/memory.ts";
import { createOperationSet } from "../../src/operations/index.ts";
import type { OperationSet } from "../../src/operations/index.ts";
import type { TaskStore } from "../../src/storage/index.ts";

describe("add", () => {
  let store: TaskStore;
  let ops: OperationSet;

  beforeEach(() => {
    store = createMemoryTaskStore();
    ops = createOperationSet({ store });
  });

  it("creates an incomplete task with trimmed fields", () => {
    const result = ops.add("  Buy milk  ", "  2 litres ");
    expect(result).toEqual({
      ok: true,
      value: { id: 1, title: "Buy milk", description: "2 litres", completed: false },
      message: "Task added successfully! (ID: 1)",
    });
    expect(store.get(1)?.title).toBe("Buy milk");
  });

  it("defaults the description to empty", () => {
    const result = ops.add("Call mom");
    expect(result.ok && result.value.description).toBe("");
  });

  it("assigns the counter value held before the call", () => {
    store.nextId();
    store.nextId();
    const result = ops.add("Third");
    expect(result.ok && result.value.id).toBe(3);
    expect(store.nextId()).toBe(4);
  });

  it.each(["", "   "])("rejects blank title %j", (title) => {
    const result = ops.add(title);
    expect(result).toEqual({
      ok: false,
      error: "Title cannot be empty",
      code: "INVALID_INPUT",
    });
    expect(store.count()).toBe(0);
  });

  it("accepts a title of exactly 100 characters", () => {
    expect(ops.add("a".repeat(100)).ok).toBe(true);
  });

  it("rejects a title longer than 100 characters", () => {
    const result = ops.add("a".repeat(101));
    expect(result).toEqual({
      ok: false,
      error: "Title cannot exceed 100 characters",
      code: "INVALID_INPUT",
    });
  });

  it("measures the title after trimming", () => {
    expect(ops.add(`  ${"a".repeat(100)}  `).ok).toBe(true);
  });

  it("accepts a description of exactly 500 characters", () => {
    const result = ops.add("Title", "d".repeat(500));
    expect(result.ok && result.value.description).toBe("d".repeat(500));
  });

  it("counts an emoji as one character in the title", () => {
    const result = ops.add("😀".repeat(100));
    expect(result.ok && result.value.title).toBe("😀".repeat(100));
    expect(ops.add("😀".repeat(101))).toEqual({
      ok: false,
      error: "Title cannot exceed 100 characters",
      code: "INVALID_INPUT",
    });
  });

  it("counts an emoji as one character in the description", () => {
    expect(ops.add("Emoji", "🎉".repeat(500)).ok).toBe(true);
    expect(ops.add("Emoji", "🎉".repeat(501))).toEqual({
      ok: false,
      error: "Description cannot exceed 500 characters",
      code: "INVALID_INPUT",
    });
    expect(store.count()).toBe(1);
  });

  it("rejects a description longer than 500 characters", () => {
    const result = ops.add("Title", "d".repeat(501));
    expect(result).toEqual({
      ok: false,
      error: "Description cannot exceed 500 characters",
      code: "INVALID_INPUT",
    });
    expect(store.count()).toBe(0);
  });

  it("does not consume an id when validation fails", () => {
    ops.add("");
    const result = ops.add("Real");
    expect(result.ok && result.value.id).toBe(1);
  });

  it("honours custom limits", () => {
    const limited = createOperationSet({
      store,
      limits: { titleMaxLength: 5, descriptionMaxLength: 3 },
    });
    expect(limited.add("Too long")).toEqual({
      ok: false,
      error: "Title cannot exceed 5 characters",
      code: "INVALID_INPUT",
    });
    expect(limited.add("Short", "abcd")).toEqual({
      ok: false,
      error: "Description cannot exceed 3 characters",
      code: "INVALID_INPUT",
    });
  });
});
