import * as k8s from '@kubernetes/client-node';
import { v4 as uuidv4 } from 'uuid';
import { ProgressMessage } from '../apis/v1/bundle.js';
import { OperationError } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { OperationExecutor, OperationKind, ServiceInstanceDescriptor } from './operation-driver.js';

export type PodClient = Pick<k8s.CoreV1Api, 'createNamespacedPod' | 'readNamespacedPod' | 'deleteNamespacedPod'>;

export type ProgressState = 'in progress' | 'succeeded' | 'failed';

export interface PodExecutorOptions {
  pollInterval: number;
  pullPolicy: string;
}

/**
 * Runs a bundle action as a pod built from the bundle image and reports the
 * pod's phase transitions as progress messages.
 */
export class PodExecutor implements OperationExecutor {
  constructor(
    private readonly pods: PodClient,
    private readonly options: PodExecutorOptions,
    private readonly logger: Logger,
  ) {}

  provision(descriptor: ServiceInstanceDescriptor, signal: AbortSignal): AsyncIterable<ProgressMessage> {
    return this.run('provision', descriptor, signal);
  }

  update(descriptor: ServiceInstanceDescriptor, signal: AbortSignal): AsyncIterable<ProgressMessage> {
    return this.run('update', descriptor, signal);
  }

  deprovision(descriptor: ServiceInstanceDescriptor, signal: AbortSignal): AsyncIterable<ProgressMessage> {
    return this.run('deprovision', descriptor, signal);
  }

  buildPod(action: OperationKind, descriptor: ServiceInstanceDescriptor, podName: string): k8s.V1Pod {
    const { context } = descriptor;
    const extraVars = {
      ...descriptor.parameters,
      _apb_service_instance_id: descriptor.id,
      namespace: context.namespace,
      cluster: context.platform,
      sandbox_role: context.sandboxRole,
    };

    return {
      apiVersion: 'v1',
      kind: 'Pod',
      metadata: {
        name: podName,
        namespace: context.namespace,
        labels: {
          'app.kubernetes.io/managed-by': 'bundle-operator',
          'bundle.automationbroker.io/action': action,
          'bundle.automationbroker.io/instance': descriptor.id,
        },
      },
      spec: {
        restartPolicy: 'Never',
        containers: [
          {
            name: 'bundle',
            image: descriptor.spec.image,
            imagePullPolicy: this.options.pullPolicy,
            args: [action, '--extra-vars', JSON.stringify(extraVars)],
            env: [
              { name: 'POD_NAME', valueFrom: { fieldRef: { fieldPath: 'metadata.name' } } },
              { name: 'POD_NAMESPACE', valueFrom: { fieldRef: { fieldPath: 'metadata.namespace' } } },
            ],
          },
        ],
      },
    };
  }

  private async *run(
    action: OperationKind,
    descriptor: ServiceInstanceDescriptor,
    signal: AbortSignal,
  ): AsyncGenerator<ProgressMessage, void, undefined> {
    const namespace = descriptor.context.namespace;
    const podName = `bundle-${action}-${descriptor.id.slice(0, 8)}-${uuidv4().slice(0, 5)}`;
    const message = (state: ProgressState, lastDescription: string): ProgressMessage => ({
      state,
      instanceID: descriptor.id,
      podName,
      lastDescription,
    });

    try {
      await this.pods.createNamespacedPod({ namespace, body: this.buildPod(action, descriptor, podName) });
    } catch (error) {
      throw new OperationError(`Failed to create ${action} pod ${namespace}/${podName}`, { cause: error });
    }
    this.logger.info(`Created ${action} pod ${namespace}/${podName}`);

    let settled = false;
    try {
      yield message('in progress', `${action} pod ${podName} created`);

      let lastPhase: string | undefined;
      while (!signal.aborted) {
        let pod: k8s.V1Pod;
        try {
          pod = await this.pods.readNamespacedPod({ name: podName, namespace });
        } catch (error) {
          throw new OperationError(`Failed to read ${action} pod ${namespace}/${podName}`, { cause: error });
        }

        const phase = pod.status?.phase ?? 'Pending';
        if (phase !== lastPhase) {
          lastPhase = phase;
          const state = stateOfPhase(phase);
          settled = state !== 'in progress';
          yield message(state, describePod(action, phase, pod));
          if (settled) {
            return;
          }
        }

        await sleep(this.options.pollInterval, signal);
      }

      yield message('failed', `${action} cancelled`);
    } finally {
      if (!settled) {
        await this.deletePod(namespace, podName);
      }
    }
  }

  private async deletePod(namespace: string, podName: string): Promise<void> {
    try {
      await this.pods.deleteNamespacedPod({ name: podName, namespace });
      this.logger.info(`Deleted unfinished pod ${namespace}/${podName}`);
    } catch (error) {
      this.logger.warn(`Failed to delete pod ${namespace}/${podName}`, { error: String(error) });
    }
  }
}

export function stateOfPhase(phase: string): ProgressState {
  switch (phase) {
    case 'Succeeded':
      return 'succeeded';
    case 'Failed':
    case 'Unknown':
      return 'failed';
    default:
      return 'in progress';
  }
}

function describePod(action: OperationKind, phase: string, pod: k8s.V1Pod): string {
  const terminated = pod.status?.containerStatuses?.[0]?.state?.terminated;
  const detail = terminated?.message || terminated?.reason || pod.status?.message;
  return detail ? `${action} pod ${phase}: ${detail}` : `${action} pod ${phase}`;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}
