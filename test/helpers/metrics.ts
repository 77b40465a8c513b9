import { DataPointType, MeterProvider, MetricReader } from '@opentelemetry/sdk-metrics';
import { EVENTS_METRIC, EventMetrics } from '../../src/utils/metrics.js';

// Reader collected on demand by the test
class CollectingReader extends MetricReader {
  protected async onForceFlush(): Promise<void> {
    return;
  }

  protected async onShutdown(): Promise<void> {
    return;
  }
}

export function testMetrics() {
  const reader = new CollectingReader();
  const provider = new MeterProvider({ readers: [reader] });
  const metrics = new EventMetrics(provider.getMeter('test'));

  // Current value of the events counter for exactly these labels
  const eventCount = async (labels: Record<string, string>): Promise<number> => {
    const { resourceMetrics } = await reader.collect();
    for (const scope of resourceMetrics.scopeMetrics) {
      for (const metric of scope.metrics) {
        if (metric.descriptor.name !== EVENTS_METRIC || metric.dataPointType !== DataPointType.SUM) {
          continue;
        }
        for (const point of metric.dataPoints) {
          const keys = Object.keys(point.attributes);
          const matches =
            keys.length === Object.keys(labels).length && keys.every((key) => point.attributes[key] === labels[key]);
          if (matches) {
            return point.value;
          }
        }
      }
    }
    return 0;
  };

  return { metrics, provider, eventCount };
}
