export interface ResourceIdentity {
  namespace: string;
  name: string;
}

export type HandlerAction = 'provision' | 'update' | 'deprovision' | 'none';

// What a single event handler invocation did
export interface HandlerResult {
  action: HandlerAction;
  reason?: string;
  messages?: number;
  error?: ReconcileError;
}

export type WatchEvent = 'add' | 'update' | 'delete';

// Callbacks a resource watch delivers events to
export interface ResourceEventHandler {
  onAdded(obj: unknown): Promise<HandlerResult>;
  onUpdated(oldObj: unknown, newObj: unknown): Promise<HandlerResult>;
  onDeleted(obj: unknown): Promise<HandlerResult>;
}

// Error types
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly reason: string = 'ReconcileError',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ReconcileError';
  }
}

export class DecodeError extends ReconcileError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'DecodeFailed');
    this.name = 'DecodeError';
  }
}

export class StoreError extends ReconcileError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, 'StoreFailed', options);
    this.name = 'StoreError';
  }
}

export class NotFoundError extends StoreError {
  constructor(resource: ResourceIdentity, options?: { cause?: unknown }) {
    super(`Resource ${resource.namespace}/${resource.name} not found`, 404, options);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends StoreError {
  constructor(resource: ResourceIdentity, options?: { cause?: unknown }) {
    super(`Resource ${resource.namespace}/${resource.name} was modified concurrently`, 409, options);
    this.name = 'ConflictError';
  }
}

export class MissingHashError extends ReconcileError {
  constructor(resource: ResourceIdentity) {
    super(`Resource ${resource.namespace}/${resource.name} has no recorded parameter hash`, 'MissingHash');
    this.name = 'MissingHashError';
  }
}

export class SerializationError extends ReconcileError {
  constructor(message: string) {
    super(message, 'SerializationFailed');
    this.name = 'SerializationError';
  }
}

export class OperationError extends ReconcileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'OperationFailed', options);
    this.name = 'OperationError';
  }
}

export class CancelledError extends ReconcileError {
  constructor(message: string, reason: 'Cancelled' | 'TimedOut' = 'Cancelled') {
    super(message, reason);
    this.name = 'CancelledError';
  }
}

export function toReconcileError(error: unknown): ReconcileError {
  if (error instanceof ReconcileError) {
    return error;
  }
  const message = error instanceof Error ? error.message : 'Unknown error occurred';
  return new ReconcileError(message, 'ReconcileError', { cause: error });
}

// Status code carried by errors thrown from the Kubernetes client
export function errorStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}
