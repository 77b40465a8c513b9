import { config } from './config/index.js';
import { BundleController } from './controllers/bundle-controller.js';
import { ResourceWatcher } from './controllers/resource-watcher.js';
import { createServer, startServer } from './server.js';
import { KubernetesService } from './services/kubernetes-service.js';
import { OperationDriver } from './services/operation-driver.js';
import { PodExecutor } from './services/pod-executor.js';
import { KubernetesResourceStore } from './services/resource-store.js';
import { StatusStore } from './services/status-store.js';
import logger, { logError } from './utils/logger.js';
import { createMetrics } from './utils/metrics.js';

async function startOperator(): Promise<void> {
  const { resource, kubernetes, bundle, operator, executor } = config;

  logger.info('Starting bundle operator...', {
    resource: `${resource.plural}.${resource.group}/${resource.version}`,
    namespace: kubernetes.namespace,
    sandboxRole: bundle.sandboxRole,
    plan: bundle.planName,
    statusFlushInterval: operator.statusFlushInterval,
    operationTimeout: operator.operationTimeout,
  });

  if (!bundle.spec) {
    throw new Error('BUNDLE_SPEC must be set to a base64-encoded bundle spec');
  }
  logger.info('Loaded bundle spec', { id: bundle.spec.id, name: bundle.spec.name, image: bundle.spec.image });

  const kubernetesService = new KubernetesService(kubernetes, logger);

  const store = new KubernetesResourceStore(
    kubernetesService.getCustomObjectsApi(),
    { ...resource, namespace: kubernetes.namespace },
    logger,
  );
  const podExecutor = new PodExecutor(
    kubernetesService.getCoreV1Api(),
    { pollInterval: executor.pollInterval, pullPolicy: bundle.pullPolicy },
    logger,
  );

  const controller = new BundleController({
    statusStore: new StatusStore(store, logger),
    driver: new OperationDriver(podExecutor, logger),
    logger,
    options: {
      namespace: kubernetes.namespace,
      sandboxRole: bundle.sandboxRole,
      planName: bundle.planName,
      bundleSpec: bundle.spec,
      statusFlushInterval: operator.statusFlushInterval,
      operationTimeout: operator.operationTimeout,
      conflictRetries: operator.conflictRetries,
      decommissionOnDelete: operator.decommissionOnDelete,
    },
  });

  const { metrics, exporter, provider } = createMetrics();

  const watcher = new ResourceWatcher(
    kubernetesService.getKubeConfig(),
    controller,
    { ...resource, namespace: kubernetes.namespace },
    logger,
    metrics,
  );

  const app = createServer({
    logger,
    isWatching: () => watcher.getIsRunning(),
    checkConnectivity: () => kubernetesService.testConnectivity(),
    metricsHandler: (req, res) => exporter.getMetricsRequestHandler(req, res),
    info: {
      resource: `${resource.plural}.${resource.group}`,
      namespace: kubernetes.namespace,
      environment: config.nodeEnv,
      exposeErrors: config.isDevelopment,
    },
  });
  const server = await startServer(app, operator.healthPort, logger);

  await watcher.start();

  const gracefulShutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    const cancelled = controller.shutdown();
    logger.info(`Cancelled ${cancelled} running operations`);
    await watcher.stop();
    await provider.shutdown();

    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
}

if (import.meta.url === `file://${process.argv[1]}`) {
  startOperator().catch((error: unknown) => {
    logError(logger, 'Failed to start operator', error);
    process.exit(1);
  });
}
