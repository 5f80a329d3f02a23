import type {
  OperationResult,
  Task,
  TaskLimits,
  TaskSummary,
} from "../lib/types.ts";
import type { TaskStore } from "../storage/index.ts";
import { createAddOperation } from "./add.ts";
import { createDeleteOperation } from "./delete.ts";
import { createListOperation, summarizeTasks } from "./list.ts";
import { runOperation } from "./runner.ts";
import { createToggleOperation } from "./toggle.ts";
import { createUpdateOperation } from "./update.ts";
import type { UpdateFields } from "./update.ts";
import { DEFAULT_LIMITS } from "./validation.ts";

export type { UpdateFields };

export interface OperationSet {
  add(title: string, description?: string): OperationResult<Task>;
  delete(id: number): OperationResult<Task>;
  update(id: number, fields: UpdateFields): OperationResult<Task>;
  list(filter?: string): OperationResult<Task[]>;
  summary(): TaskSummary;
  toggle(id: number, markAs?: boolean): OperationResult<Task>;
}

export function createOperationSet(opts: {
  store: TaskStore;
  limits?: TaskLimits;
}): OperationSet {
  const deps = { store: opts.store, limits: opts.limits ?? DEFAULT_LIMITS };

  const addOp = createAddOperation(deps);
  const deleteOp = createDeleteOperation(deps);
  const updateOp = createUpdateOperation(deps);
  const listOp = createListOperation(deps);
  const toggleOp = createToggleOperation(deps);

  return {
    add: (title, description) => runOperation(addOp, { title, description }),
    delete: (id) => runOperation(deleteOp, { id }),
    update: (id, fields) => runOperation(updateOp, { id, ...fields }),
    list: (filter) => runOperation(listOp, { filter }),
    summary: () => summarizeTasks(deps.store.getAll()),
    toggle: (id, markAs) => runOperation(toggleOp, { id, markAs }),
  };
}
