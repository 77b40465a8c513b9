import { BundleParameters, ProgressMessage } from '../apis/v1/bundle.js';
import { BundleSpec } from '../config/index.js';
import { OperationError } from '../types/index.js';
import { Logger } from '../utils/logger.js';

export type OperationKind = 'provision' | 'update' | 'deprovision';

export interface ServiceInstanceContext {
  platform: string;
  namespace: string;
  sandboxRole: string;
  notSandboxed: boolean;
}

// Built for one operation call and never persisted
export interface ServiceInstanceDescriptor {
  id: string;
  spec: BundleSpec;
  context: ServiceInstanceContext;
  parameters: BundleParameters;
}

/**
 * Engine performing the long-running bundle work. Each call returns a live
 * sequence of progress messages that ends when the operation completes.
 */
export interface OperationExecutor {
  provision(descriptor: ServiceInstanceDescriptor, signal: AbortSignal): AsyncIterable<ProgressMessage>;
  update(descriptor: ServiceInstanceDescriptor, signal: AbortSignal): AsyncIterable<ProgressMessage>;
  // Optional decommission hook, only used when the operator is told to run it on delete
  deprovision?(descriptor: ServiceInstanceDescriptor, signal: AbortSignal): AsyncIterable<ProgressMessage>;
}

export class OperationDriver {
  constructor(
    private readonly executor: OperationExecutor,
    private readonly logger: Logger,
  ) {}

  start(
    kind: Exclude<OperationKind, 'deprovision'>,
    descriptor: ServiceInstanceDescriptor,
    signal: AbortSignal = new AbortController().signal,
  ): AsyncIterable<ProgressMessage> {
    const open =
      kind === 'provision'
        ? (s: AbortSignal) => this.executor.provision(descriptor, s)
        : (s: AbortSignal) => this.executor.update(descriptor, s);
    return this.stream(kind, descriptor, open, signal);
  }

  supportsDecommission(): boolean {
    return typeof this.executor.deprovision === 'function';
  }

  decommission(
    descriptor: ServiceInstanceDescriptor,
    signal: AbortSignal = new AbortController().signal,
  ): AsyncIterable<ProgressMessage> | null {
    const { executor } = this;
    if (!executor.deprovision) {
      return null;
    }
    const deprovision = executor.deprovision.bind(executor);
    return this.stream('deprovision', descriptor, (s) => deprovision(descriptor, s), signal);
  }

  private async *stream(
    kind: OperationKind,
    descriptor: ServiceInstanceDescriptor,
    open: (signal: AbortSignal) => AsyncIterable<ProgressMessage>,
    signal: AbortSignal,
  ): AsyncGenerator<ProgressMessage, void, undefined> {
    this.logger.info(`Starting ${kind} for service instance ${descriptor.id}`, {
      namespace: descriptor.context.namespace,
      bundle: descriptor.spec.name,
    });

    let iterator: AsyncIterator<ProgressMessage>;
    try {
      iterator = open(signal)[Symbol.asyncIterator]();
    } catch (error) {
      throw new OperationError(`Failed to start ${kind} for service instance ${descriptor.id}`, { cause: error });
    }

    let count = 0;
    let exhausted = false;
    try {
      for (;;) {
        const pending = iterator.next();
        // Keeps a rejection that lands after cancellation from going unhandled
        pending.catch((error: unknown) => {
          if (signal.aborted) {
            this.logger.debug(`Executor failed after ${kind} was cancelled`, { error: String(error) });
          }
        });

        let next: IteratorResult<ProgressMessage> | 'aborted';
        try {
          next = await untilAborted(pending, signal);
        } catch (error) {
          exhausted = true;
          throw new OperationError(`${kind} failed for service instance ${descriptor.id}`, { cause: error });
        }

        if (next === 'aborted') {
          this.logger.warn(`${kind} for service instance ${descriptor.id} cancelled`, { messages: count });
          return;
        }
        if (next.done) {
          exhausted = true;
          break;
        }
        count++;
        yield next.value;
      }
    } finally {
      if (!exhausted) {
        this.close(iterator, kind);
      }
    }

    this.logger.info(`${kind} for service instance ${descriptor.id} finished`, { messages: count });
  }

  private close(iterator: AsyncIterator<ProgressMessage>, kind: OperationKind): void {
    if (!iterator.return) {
      return;
    }
    iterator.return().catch((error: unknown) => {
      this.logger.debug(`Failed to close ${kind} progress stream`, { error: String(error) });
    });
  }
}

// Settles with `pending`, or with 'aborted' once the signal fires. The abort listener goes away when `pending` settles.
function untilAborted<T>(pending: Promise<T>, signal: AbortSignal): Promise<T | 'aborted'> {
  if (signal.aborted) {
    return Promise.resolve('aborted');
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve('aborted');
    signal.addEventListener('abort', onAbort, { once: true });
    pending.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
