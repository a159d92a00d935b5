export class SynapticError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SynapticError';
  }
}

export class ValidationError extends SynapticError {
  constructor(message: string) {
    super(`Validation failed: ${message}`);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends SynapticError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export class BackendUnavailableError extends SynapticError {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    super(`Vector backend failed during ${operation}: ${getErrorMessage(cause)}`, { cause });
    this.name = 'BackendUnavailableError';
  }
}

export class CollectionNotFoundError extends SynapticError {
  constructor(public readonly collection: string) {
    super(`Collection not found: ${collection}`);
    this.name = 'CollectionNotFoundError';
  }
}

export class DimensionMismatchError extends SynapticError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context: string,
  ) {
    super(`Dimension mismatch in ${context}: expected ${expected}, got ${actual}`);
    this.name = 'DimensionMismatchError';
  }
}

export class ConfirmationRequiredError extends SynapticError {
  constructor(public readonly operation: string) {
    super(`${operation} destroys stored vectors and requires explicit confirmation`);
    this.name = 'ConfirmationRequiredError';
  }
}

export class OperationAbortedError extends SynapticError {
  constructor(operation: string) {
    super(`Operation aborted: ${operation}`);
    this.name = 'OperationAbortedError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationAbortedError(operation);
  }
}
