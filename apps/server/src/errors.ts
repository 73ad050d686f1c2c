export type ErrorKind =
  | 'validation'
  | 'not-found'
  | 'state-conflict'
  | 'remote'
  | 'transport';

export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly httpStatus: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Caller supplied an invalid combination (unknown network, missing media)
export class ValidationError extends AppError {
  readonly kind = 'validation';
  readonly httpStatus = 400;
}

export class NotFoundError extends AppError {
  readonly kind = 'not-found';
  readonly httpStatus = 404;

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`);
  }
}

// Operation not allowed from the record's current status
export class StateConflictError extends AppError {
  readonly kind = 'state-conflict';
  readonly httpStatus = 409;
}

// Platform answered with a non-2xx status
export class RemoteError extends AppError {
  readonly kind = 'remote';
  readonly httpStatus = 502;

  constructor(
    readonly target: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${target} failed (${status}): ${body}`);
  }
}

// Platform or auxiliary service could not be reached in time
export class TransportError extends AppError {
  readonly kind = 'transport';
  readonly httpStatus = 504;

  constructor(target: string, reason: string) {
    super(`${target} unreachable: ${reason}`);
  }
}

export type PublishFailure = ValidationError | RemoteError | TransportError;

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
