// Error types shared by the storage modules and domain services
export class TrackerError extends Error {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'TrackerError';
    this.cause = cause;
  }
}

export type TrackedEntity = 'goal' | 'session' | 'day' | 'tag';

export class NotFoundError extends TrackerError {
  public readonly entity: TrackedEntity;
  public readonly entityId: string;

  constructor(entity: TrackedEntity, entityId: string) {
    super(`No ${entity} found with id ${entityId}`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.entityId = entityId;
  }
}

export class ValidationError extends TrackerError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class PersistenceError extends TrackerError {
  constructor(message: string, cause?: Error) {
    super(`Persistence failed: ${message}`, cause);
    this.name = 'PersistenceError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
