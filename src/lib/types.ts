export interface Task {
  id: number;
  title: string;
  description: string;
  completed: boolean;
}

export type TaskChanges = Partial<Pick<Task, "title" | "description" | "completed">>;

export type StatusFilter = "complete" | "incomplete";

export interface TaskSummary {
  total: number;
  complete: number;
  incomplete: number;
}

export interface TaskLimits {
  titleMaxLength: number;
  descriptionMaxLength: number;
}

export type ErrorCode = "INVALID_INPUT" | "NOT_FOUND";

/**
 * Outcome of an operation. Success carries the produced value plus a
 * human-readable line for the renderer; failure carries only the error.
 */
export type OperationResult<T> =
  | { ok: true; value: T; message: string }
  | { ok: false; error: string; code: ErrorCode };
