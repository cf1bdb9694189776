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

export enum BUFFER_ERROR {
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
  NOT_FOUND = "NOT_FOUND",
  OUT_OF_MEMORY = "OUT_OF_MEMORY",
  OVERFLOW = "OVERFLOW",
}

export class BufferError extends AppError {
  constructor(
    public readonly category: BUFFER_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_buffer_error(error: unknown): error is BufferError {
  return error instanceof BufferError;
}
