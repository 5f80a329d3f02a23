export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, { cause });
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "INVALID_INPUT", cause);
  }
}

export class NotFoundError extends AppError {
  public readonly taskId: number;

  constructor(taskId: number) {
    super(`Task with ID ${taskId} not found`, "NOT_FOUND");
    this.taskId = taskId;
  }
}

export class InputClosedError extends AppError {
  constructor() {
    super("Input stream closed", "INPUT_CLOSED");
  }
}
