import { describe, it, expect } from "vitest";
import { createOperationSet } from "../../src/operations/index.ts";
import { createMemoryTaskStore } from "../../src/storage/memory.ts";

describe("operation set", () => {
  it("exposes every operation plus summary", () => {
    const ops = createOperationSet({ store: createMemoryTaskStore() });
    expect(Object.keys(ops).sort()).toEqual([
      "add",
      "delete",
      "list",
      "summary",
      "toggle",
      "update",
    ]);
  });
});
