import { Counter, Meter } from '@opentelemetry/api';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { MeterProvider } from '@opentelemetry/sdk-metrics';
import { HandlerResult, WatchEvent } from '../types/index.js';

export const EVENTS_METRIC = 'bundle_operator_events';

/**
 * Counts every watch event the operator handled, labelled with the event and
 * what the handler did about it.
 */
export class EventMetrics {
  private readonly events: Counter;

  constructor(meter: Meter) {
    this.events = meter.createCounter(EVENTS_METRIC, {
      description: 'Watch events handled, by event, action and reason',
    });
  }

  recordEvent(event: WatchEvent, result: HandlerResult): void {
    this.events.add(1, { event, action: result.action, reason: result.reason ?? 'Completed' });
  }
}

export interface MetricsPipeline {
  metrics: EventMetrics;
  exporter: PrometheusExporter;
  provider: MeterProvider;
}

// Prometheus exposition is served by the health server, so the exporter starts no server of its own
export function createMetrics(serviceName = 'bundle-operator'): MetricsPipeline {
  const exporter = new PrometheusExporter({ preventServerStart: true });
  const provider = new MeterProvider({ readers: [exporter] });
  return { metrics: new EventMetrics(provider.getMeter(serviceName)), exporter, provider };
}
