import type { LogEntry, MetricEntry, SpanEntry, TelemetryClient, TelemetryConfig } from "./types.js";
import { buildBaseMetadata, normalizeEndpoint, readEnvConfig } from "./config.js";
import { getMetricDefinition } from "./metrics.js";
import { BatchQueue, type Stream } from "./queue.js";
import { send } from "./transport.js";

const noopClient: TelemetryClient = {
  log: () => undefined,
  event: () => undefined,
  metric: () => undefined,
  span: () => undefined,
  flush: async () => undefined,
  shutdown: async () => undefined,
};

/**
 * Create a telemetry client. Settings come from the TELEMETRY_* environment
 * variables unless overridden; a disabled client, or one without an
 * endpoint, is a no-op.
 *
 * @example
 * ```typescript
 * const telemetry = createTelemetryClient({ serviceId: 'runtime' });
 * telemetry.metric('workflow.execution.count', 1, { workflowId });
 * ```
 */
export function createTelemetryClient(
  overrides: Partial<TelemetryConfig> & { serviceId: string },
): TelemetryClient {
  const defaults = readEnvConfig();
  const config: TelemetryConfig = {
    ...defaults,
    ...overrides,
    endpoint: normalizeEndpoint(overrides.endpoint || defaults.endpoint),
  };

  if (!config.enabled || !config.endpoint) {
    return noopClient;
  }

  const base = buildBaseMetadata(config);

  const logs: Stream<LogEntry> = {
    path: "/logs/ingest",
    queue: new BatchQueue(config.maxQueue),
    wrap: (entries) => ({ stream: `service.${config.serviceId}.logs`, entries }),
  };
  const metrics: Stream<MetricEntry> = {
    path: "/metrics/ingest",
    queue: new BatchQueue(config.maxQueue),
    wrap: (dataPoints) => ({ dataPoints }),
  };
  const traces: Stream<SpanEntry> = {
    path: "/traces/ingest",
    queue: new BatchQueue(config.maxQueue),
    wrap: (spans) => ({ spans }),
  };

  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<void> | null = null;

  async function ship<T>(stream: Stream<T>): Promise<void> {
    const batch = stream.queue.take(config.maxBatch);
    if (batch.length > 0) {
      await send(config, stream.path, stream.wrap(batch));
    }
  }

  // One batch per stream per tick; overlapping ticks share the pending run
  function flush(): Promise<void> {
    inFlight ??= (async () => {
      try {
        await ship(logs);
        await ship(metrics);
        await ship(traces);
      } finally {
        inFlight = null;
      }
    })();
    return inFlight;
  }

  function enqueue<T>(stream: Stream<T>, entry: T): void {
    stream.queue.push(entry);
    if (!timer) {
      timer = setInterval(() => void flush(), config.flushMs);
      timer.unref();
    }
  }

  function log(level: string, message: string, metadata: Record<string, unknown> = {}): void {
    enqueue(logs, { timestamp: new Date().toISOString(), level, message, metadata: { ...base, ...metadata } });
  }

  return {
    log,
    event(eventType, message, metadata = {}, level = "info") {
      log(level, message, { eventType, ...metadata });
    },
    metric(name, value, labels = {}) {
      enqueue(metrics, {
        name,
        type: getMetricDefinition(name).type,
        timestamp: new Date().toISOString(),
        value,
        labels: { ...base, ...labels },
      });
    },
    span(entry) {
      enqueue(traces, {
        ...entry,
        serviceName: entry.serviceName || config.serviceId,
        attributes: { ...base, ...entry.attributes },
      });
    },
    flush,
    async shutdown() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
      await flush();
      while (logs.queue.size + metrics.queue.size + traces.queue.size > 0) {
        await flush();
      }
    },
  };
}
