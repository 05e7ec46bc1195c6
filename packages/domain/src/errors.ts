export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Raised when a price query cannot be answered with the given input or the
 * data currently cached. The message is meant for the caller.
 */
export class ServiceValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ServiceValidationError";
  }
}

export class UpdateFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UpdateFailedError";
  }
}
