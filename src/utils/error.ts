export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum CONTAINER_ERROR {
  OUT_OF_MEMORY = "OUT_OF_MEMORY",
  BAD_ARGUMENT = "BAD_ARGUMENT",
  USE_AFTER_FREE = "USE_AFTER_FREE",
  MODIFIED_DURING_ITERATION = "MODIFIED_DURING_ITERATION",
}

export class ContainerError extends AppError {
  constructor(
    public readonly category: CONTAINER_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_container_error(error: unknown): error is ContainerError {
  return error instanceof ContainerError;
}

export function out_of_memory(
  message: string,
  context?: Record<string, unknown>,
): ContainerError {
  return new ContainerError(CONTAINER_ERROR.OUT_OF_MEMORY, message, context);
}

export function use_after_free(container: string): ContainerError {
  return new ContainerError(
    CONTAINER_ERROR.USE_AFTER_FREE,
    `${container} used after free()`,
    { container },
  );
}

export function modified_during_iteration(
  container: string,
  context?: Record<string, unknown>,
): ContainerError {
  return new ContainerError(
    CONTAINER_ERROR.MODIFIED_DURING_ITERATION,
    `${container} was resized during iteration`,
    { container, ...context },
  );
}
