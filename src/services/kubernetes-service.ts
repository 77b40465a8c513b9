import * as k8s from '@kubernetes/client-node';
import { Logger, errorMeta } from '../utils/logger.js';

export interface KubernetesServiceOptions {
  kubeconfig?: string;
  namespace: string;
}

export class KubernetesService {
  private readonly kubeConfig: k8s.KubeConfig;
  private readonly coreV1Api: k8s.CoreV1Api;
  private readonly customObjectsApi: k8s.CustomObjectsApi;
  private readonly versionApi: k8s.VersionApi;

  constructor(
    private readonly options: KubernetesServiceOptions,
    private readonly logger: Logger,
  ) {
    this.kubeConfig = new k8s.KubeConfig();

    // Explicit kubeconfig first, then in-cluster service account, then the default lookup
    try {
      if (options.kubeconfig) {
        this.kubeConfig.loadFromFile(options.kubeconfig);
        logger.info(`Loaded Kubernetes configuration from ${options.kubeconfig}`);
      } else if (process.env.KUBERNETES_SERVICE_HOST && process.env.KUBERNETES_SERVICE_PORT) {
        this.kubeConfig.loadFromCluster();
        logger.info('Loaded in-cluster Kubernetes configuration');
      } else {
        this.kubeConfig.loadFromDefault();
        logger.info('Loaded default Kubernetes configuration');
      }
    } catch (error) {
      logger.error('Failed to load Kubernetes configuration', errorMeta(error));
      throw new Error('Unable to load Kubernetes configuration', { cause: error });
    }

    this.coreV1Api = this.kubeConfig.makeApiClient(k8s.CoreV1Api);
    this.customObjectsApi = this.kubeConfig.makeApiClient(k8s.CustomObjectsApi);
    this.versionApi = this.kubeConfig.makeApiClient(k8s.VersionApi);

    logger.info('Kubernetes service initialized', { namespace: options.namespace });
  }

  getKubeConfig(): k8s.KubeConfig {
    return this.kubeConfig;
  }

  getCoreV1Api(): k8s.CoreV1Api {
    return this.coreV1Api;
  }

  getCustomObjectsApi(): k8s.CustomObjectsApi {
    return this.customObjectsApi;
  }

  /**
   * Test connectivity to the Kubernetes API
   */
  async testConnectivity(): Promise<boolean> {
    try {
      await this.versionApi.getCode();
      return true;
    } catch (error) {
      this.logger.error('Failed to connect to Kubernetes API', errorMeta(error));
      return false;
    }
  }
}
