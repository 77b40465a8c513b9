import { v4 as uuidv4 } from 'uuid';
import {
  Bundle,
  BundleParameters,
  BundleStatus,
  decodeBundle,
  identityOf,
  peekMetadata,
  resourceKey,
} from '../apis/v1/bundle.js';
import { BundleSpec } from '../config/index.js';
import { OperationDriver, OperationKind, ServiceInstanceDescriptor } from '../services/operation-driver.js';
import { StatusStore } from '../services/status-store.js';
import {
  CancelledError,
  DecodeError,
  HandlerAction,
  HandlerResult,
  MissingHashError,
  ResourceEventHandler,
  ResourceIdentity,
  toReconcileError,
} from '../types/index.js';
import { fingerprint } from '../utils/hash.js';
import { Logger, logError } from '../utils/logger.js';
import { StatusUpdater } from '../utils/status-updater.js';

// Parameter carrying the plan name into every operation
export const PLAN_PARAMETER = '_apb_plan_id';
export const PLATFORM = 'kubernetes';

export interface BundleControllerOptions {
  namespace: string;
  sandboxRole: string;
  planName: string;
  bundleSpec: BundleSpec;
  statusFlushInterval: number;
  operationTimeout: number;
  conflictRetries: number;
  decommissionOnDelete: boolean;
}

export interface BundleControllerDeps {
  statusStore: StatusStore;
  driver: OperationDriver;
  logger: Logger;
  options: BundleControllerOptions;
  generateId?: () => string;
}

/**
 * Reconciles bundle resources. A provision runs when a resource is added and
 * an update runs whenever the fingerprint of its spec moves away from the
 * `parameterHash` recorded in its status. Progress of the running operation is
 * streamed into `status.messages`.
 */
export class BundleController implements ResourceEventHandler {
  private readonly statusStore: StatusStore;
  private readonly driver: OperationDriver;
  private readonly logger: Logger;
  private readonly options: BundleControllerOptions;
  private readonly generateId: () => string;
  private readonly operations = new Map<string, Set<AbortController>>();

  constructor(deps: BundleControllerDeps) {
    this.statusStore = deps.statusStore;
    this.driver = deps.driver;
    this.logger = deps.logger;
    this.options = deps.options;
    this.generateId = deps.generateId ?? (() => uuidv4());
  }

  async onAdded(obj: unknown): Promise<HandlerResult> {
    let key = describeObject(obj);
    let action: HandlerAction = 'none';

    try {
      const bundle = decodeBundle(obj);
      const identity = identityOf(bundle, this.options.namespace);
      key = resourceKey(identity);
      const parameterHash = fingerprint(bundle.spec);

      // An add for a resource we already own comes from a re-list of the watch
      const existingId = bundle.status.serviceInstanceID;
      if (existingId && bundle.status.parameterHash === parameterHash) {
        this.logger.info(`Bundle ${key} already converged, skipping provision`, { parameterHash });
        return { action: 'none', reason: 'Converged' };
      }

      const serviceInstanceID = existingId ?? this.generateId();
      this.logger.info(`Bundle ${key} added`, { serviceInstanceID, parameterHash });

      const status: BundleStatus = { parameterHash, serviceInstanceID, messages: [] };
      await this.persist(identity, status);

      action = 'provision';
      const outcome = await this.runOperation('provision', identity, bundle, serviceInstanceID, status);
      return { action, ...outcome };
    } catch (error) {
      return this.fail('added', key, action, error);
    }
  }

  async onUpdated(oldObj: unknown, newObj: unknown): Promise<HandlerResult> {
    let key = describeObject(newObj);
    let action: HandlerAction = 'none';

    try {
      const bundle = decodeBundle(newObj);
      const identity = identityOf(bundle, this.options.namespace);
      key = resourceKey(identity);
      const parameterHash = fingerprint(bundle.spec);

      const previousHash = bundle.status.parameterHash;
      if (!previousHash) {
        const error = new MissingHashError(identity);
        this.logger.info(`Bundle ${key} not updated: ${error.message}`, {
          oldResourceVersion: resourceVersionOf(oldObj),
          resourceVersion: bundle.metadata.resourceVersion,
        });
        return { action: 'none', reason: error.reason, error };
      }

      if (previousHash === parameterHash) {
        this.logger.debug(`Bundle ${key} parameters unchanged`, { parameterHash });
        return { action: 'none', reason: 'Unchanged' };
      }

      const serviceInstanceID = bundle.status.serviceInstanceID;
      if (!serviceInstanceID) {
        throw new DecodeError(`Bundle ${key} has a parameter hash but no serviceInstanceID`, [
          'status.serviceInstanceID: Required',
        ]);
      }

      this.logger.info(`Bundle ${key} parameters changed`, {
        serviceInstanceID,
        previousHash,
        parameterHash,
      });

      const status: BundleStatus = { parameterHash, messages: [] };
      await this.persist(identity, status);

      action = 'update';
      const outcome = await this.runOperation('update', identity, bundle, serviceInstanceID, status);
      return { action, ...outcome };
    } catch (error) {
      return this.fail('updated', key, action, error);
    }
  }

  async onDeleted(obj: unknown): Promise<HandlerResult> {
    let key = describeObject(obj);
    let action: HandlerAction = 'none';

    try {
      const bundle = decodeBundle(obj);
      const identity = identityOf(bundle, this.options.namespace);
      key = resourceKey(identity);

      const cancelled = this.cancel(key, 'resource deleted');
      this.logger.info(`Bundle ${key} deleted`, {
        serviceInstanceID: bundle.status.serviceInstanceID,
        cancelledOperations: cancelled,
      });

      if (!this.options.decommissionOnDelete) {
        return { action: 'none', reason: 'Deleted' };
      }

      const serviceInstanceID = bundle.status.serviceInstanceID;
      if (!serviceInstanceID) {
        return { action: 'none', reason: 'NotProvisioned' };
      }
      if (!this.driver.supportsDecommission()) {
        this.logger.warn(`Executor has no decommission hook, leaving bundle ${key} in place`);
        return { action: 'none', reason: 'NoDecommissionHook' };
      }

      action = 'deprovision';
      const descriptor = this.buildDescriptor(serviceInstanceID, bundle.spec);
      const outcome = await this.track(key, async (signal) => {
        let messages = 0;
        const stream = this.driver.decommission(descriptor, signal);
        if (stream) {
          for await (const message of stream) {
            messages++;
            this.logger.info(`Decommission progress for ${key}`, { message });
          }
        }
        return { messages };
      });
      return { action, ...outcome };
    } catch (error) {
      return this.fail('deleted', key, action, error);
    }
  }

  // Aborts every operation still running
  shutdown(): number {
    let cancelled = 0;
    for (const key of Array.from(this.operations.keys())) {
      cancelled += this.cancel(key, 'operator shutting down');
    }
    return cancelled;
  }

  inFlight(key?: string): number {
    if (key !== undefined) {
      return this.operations.get(key)?.size ?? 0;
    }
    let total = 0;
    for (const set of this.operations.values()) {
      total += set.size;
    }
    return total;
  }

  buildDescriptor(id: string, parameters: BundleParameters): ServiceInstanceDescriptor {
    return {
      id,
      spec: this.options.bundleSpec,
      context: {
        platform: PLATFORM,
        namespace: this.options.namespace,
        sandboxRole: this.options.sandboxRole,
        notSandboxed: true,
      },
      parameters: { ...parameters, [PLAN_PARAMETER]: this.options.planName },
    };
  }

  private async runOperation(
    kind: Exclude<OperationKind, 'deprovision'>,
    identity: ResourceIdentity,
    bundle: Bundle,
    serviceInstanceID: string,
    status: BundleStatus,
  ): Promise<Pick<HandlerResult, 'messages' | 'reason'>> {
    const key = resourceKey(identity);
    const descriptor = this.buildDescriptor(serviceInstanceID, bundle.spec);

    return this.track(key, async (signal) => {
      const updater = new StatusUpdater(
        status,
        (next) => this.persist(identity, next),
        this.options.statusFlushInterval,
      );

      try {
        for await (const message of this.driver.start(kind, descriptor, signal)) {
          await updater.append(message);
          this.logger.info(`Progress message for ${key}`, { message });
        }
      } catch (error) {
        // Messages received before the failure are still persisted
        await updater.close().catch((closeError: unknown) => {
          logError(this.logger, `Failed to persist progress for ${key}`, closeError);
        });
        throw error;
      }
      await updater.close();

      return signal.aborted
        ? { messages: updater.count, reason: cancellationReason(signal) }
        : { messages: updater.count };
    });
  }

  // Registers a cancellable operation for the resource, bounded by the operation timeout
  private async track<T>(key: string, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let running = this.operations.get(key);
    if (!running) {
      running = new Set();
      this.operations.set(key, running);
    }
    running.add(controller);

    const timeout =
      this.options.operationTimeout > 0
        ? setTimeout(() => {
            controller.abort(new CancelledError(`Operation for ${key} timed out`, 'TimedOut'));
          }, this.options.operationTimeout)
        : undefined;

    try {
      return await run(controller.signal);
    } finally {
      clearTimeout(timeout);
      running.delete(controller);
      if (running.size === 0 && this.operations.get(key) === running) {
        this.operations.delete(key);
      }
    }
  }

  private cancel(key: string, reason: string): number {
    const running = this.operations.get(key);
    if (!running) {
      return 0;
    }
    for (const controller of running) {
      controller.abort(new CancelledError(`Operation for ${key} cancelled: ${reason}`));
    }
    return running.size;
  }

  private async persist(identity: ResourceIdentity, status: BundleStatus): Promise<void> {
    await this.statusStore.writeWithRetry(identity, status, this.options.conflictRetries);
  }

  private fail(event: string, key: string, action: HandlerAction, error: unknown): HandlerResult {
    const reconcileError = toReconcileError(error);
    logError(this.logger, `Failed to handle ${event} event for ${key}`, reconcileError, {
      resource: key,
      reason: reconcileError.reason,
    });
    return { action, reason: reconcileError.reason, error: reconcileError };
  }
}

function cancellationReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  return reason instanceof CancelledError ? reason.reason : 'Cancelled';
}

function describeObject(obj: unknown): string {
  const { name = '<unknown>', namespace } = peekMetadata(obj);
  return namespace ? `${namespace}/${name}` : name;
}

function resourceVersionOf(obj: unknown): string | undefined {
  return peekMetadata(obj).resourceVersion;
}
