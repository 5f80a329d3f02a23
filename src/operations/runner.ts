import type { OperationResult } from "../lib/types.ts";
import { InvalidInputError, NotFoundError } from "../lib/errors.ts";
import { createChildLogger } from "../lib/logger.ts";
import type { Operation } from "./types.ts";

const log = createChildLogger("operations");

export function runOperation<TInput, TParsed, TOutput>(
  operation: Operation<TInput, TParsed, TOutput>,
  input: TInput,
): OperationResult<TOutput> {
  const validation = operation.validate(input);
  if (!validation.ok) {
    log.info(
      { operation: operation.name, code: "INVALID_INPUT" },
      validation.error,
    );
    return { ok: false, error: validation.error, code: "INVALID_INPUT" };
  }

  try {
    const value = operation.execute(validation.value);
    log.debug({ operation: operation.name }, "Operation succeeded");
    return { ok: true, value, message: operation.describeSuccess(value) };
  } catch (err) {
    if (err instanceof NotFoundError) {
      log.info(
        { operation: operation.name, code: err.code, taskId: err.taskId },
        err.message,
      );
      return { ok: false, error: err.message, code: "NOT_FOUND" };
    }
    if (err instanceof InvalidInputError) {
      log.info({ operation: operation.name, code: err.code }, err.message);
      return { ok: false, error: err.message, code: "INVALID_INPUT" };
    }
    throw err;
  }
}
