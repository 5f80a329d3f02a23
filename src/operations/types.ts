import type { TaskStore } from "../storage/index.ts";
import type { TaskLimits } from "../lib/types.ts";

export type Validation<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * One named action against the store. `validate` never touches the store;
 * `execute` reports a missing task by throwing `NotFoundError`, which
 * `runOperation` turns into a failed result.
 */
export interface Operation<TInput, TParsed, TOutput> {
  readonly name: string;
  validate(input: TInput): Validation<TParsed>;
  execute(input: TParsed): TOutput;
  describeSuccess(output: TOutput): string;
}

export interface OperationDeps {
  store: TaskStore;
  limits: TaskLimits;
}
