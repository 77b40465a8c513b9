import * as k8s from '@kubernetes/client-node';
import {
  HandlerResult,
  ResourceEventHandler,
  WatchEvent,
  errorStatusCode,
  toReconcileError,
} from '../types/index.js';
import { Logger, logError } from '../utils/logger.js';
import { EventMetrics } from '../utils/metrics.js';

export interface WatcherOptions {
  group: string;
  version: string;
  plural: string;
  namespace: string;
  restartDelay?: number;
}

/**
 * Watches the custom resource and delivers added, updated and deleted events
 * to a handler. Every event runs its handler to completion on its own; the
 * watcher adds no ordering between events.
 */
export class ResourceWatcher {
  private informer?: k8s.Informer<k8s.KubernetesObject>;
  private readonly lastSeen = new Map<string, k8s.KubernetesObject>();
  private readonly pending = new Set<Promise<HandlerResult>>();
  private isRunning = false;

  constructor(
    private readonly kc: k8s.KubeConfig,
    private readonly handler: ResourceEventHandler,
    private readonly options: WatcherOptions,
    private readonly logger: Logger,
    private readonly metrics?: EventMetrics,
  ) {}

  public async start(): Promise<void> {
    if (this.isRunning) {
      this.logger.info(`Watcher for ${this.options.plural} is already running`);
      return;
    }

    this.logger.info(`Starting watcher for ${this.options.plural}...`);
    this.isRunning = true;
    await this.setupWatch();
  }

  public async stop(): Promise<void> {
    this.logger.info(`Stopping watcher for ${this.options.plural}...`);
    this.isRunning = false;

    if (this.informer) {
      await this.informer.stop();
      this.informer = undefined;
    }

    await this.drain();
    this.lastSeen.clear();
  }

  public getIsRunning(): boolean {
    return this.isRunning;
  }

  public pendingEvents(): number {
    return this.pending.size;
  }

  // Waits for every handler invocation started so far
  public async drain(): Promise<void> {
    await Promise.allSettled(Array.from(this.pending));
  }

  public dispatch(event: WatchEvent, obj: k8s.KubernetesObject): Promise<HandlerResult> {
    const key = objectKey(obj);
    this.logger.debug(`${event} ${this.options.plural}: ${key}`);

    const invoke = this.invoker(event, key, obj);
    const run = invoke()
      .catch((error: unknown): HandlerResult => {
        const reconcileError = toReconcileError(error);
        logError(this.logger, `Unhandled error in ${event} handler for ${key}`, reconcileError);
        return { action: 'none', reason: reconcileError.reason, error: reconcileError };
      })
      .then((result) => {
        this.metrics?.recordEvent(event, result);
        return result;
      });
    this.pending.add(run);
    void run.finally(() => this.pending.delete(run));
    return run;
  }

  private invoker(event: WatchEvent, key: string, obj: k8s.KubernetesObject): () => Promise<HandlerResult> {
    switch (event) {
      case 'add':
        this.lastSeen.set(key, obj);
        return () => this.handler.onAdded(obj);
      case 'update': {
        // The informer only reports the new object, so the old one comes from our own cache
        const previous = this.lastSeen.get(key) ?? obj;
        this.lastSeen.set(key, obj);
        return () => this.handler.onUpdated(previous, obj);
      }
      case 'delete':
        this.lastSeen.delete(key);
        return () => this.handler.onDeleted(obj);
    }
  }

  protected async setupWatch(): Promise<void> {
    const { group, version, plural, namespace } = this.options;
    const customObjectsApi = this.kc.makeApiClient(k8s.CustomObjectsApi);
    const listFn = () => customObjectsApi.listNamespacedCustomObject({ group, version, namespace, plural });

    const informer = k8s.makeInformer<k8s.KubernetesObject>(
      this.kc,
      `/apis/${group}/${version}/namespaces/${namespace}/${plural}`,
      listFn,
    );
    this.informer = informer;

    informer.on('add', (obj: k8s.KubernetesObject) => {
      void this.dispatch('add', obj);
    });
    informer.on('update', (obj: k8s.KubernetesObject) => {
      void this.dispatch('update', obj);
    });
    informer.on('delete', (obj: k8s.KubernetesObject) => {
      void this.dispatch('delete', obj);
    });
    informer.on('error', (err: unknown) => {
      logError(this.logger, `Watch error for ${plural}`, err, { statusCode: errorStatusCode(err) });
      setTimeout(() => {
        if (this.isRunning && this.informer === informer) {
          this.logger.info(`Restarting watch for ${plural}`);
          this.setupWatch().catch((error: unknown) => {
            logError(this.logger, `Failed to restart watch for ${plural}`, error);
          });
        }
      }, this.options.restartDelay ?? 1000);
    });

    await informer.start();
  }
}

export function objectKey(obj: k8s.KubernetesObject): string {
  const name = obj.metadata?.name ?? '<unknown>';
  return obj.metadata?.namespace ? `${obj.metadata.namespace}/${name}` : name;
}
