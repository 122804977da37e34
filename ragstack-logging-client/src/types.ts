export type TelemetryAuthMode = "apiKey" | "bearer" | "none";

export interface TelemetryConfig {
  serviceId: string;
  enabled: boolean;
  /** Base URL; normalized to end in `/api` */
  endpoint: string;
  authMode: TelemetryAuthMode;
  apiKey: string;
  bearer: string;
  env: string;
  maxBatch: number;
  flushMs: number;
  /** Retries after the first failed POST of a batch */
  retry: number;
  maxQueue: number;
}

export type MetricType = "counter" | "gauge" | "histogram";

export interface MetricDefinition {
  type: MetricType;
  description: string;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  metadata?: Record<string, unknown>;
}

export interface MetricEntry {
  name: string;
  type: MetricType;
  timestamp: string;
  value: number;
  labels?: Record<string, unknown>;
}

export interface SpanEntry {
  traceId: string;
  spanId: string;
  parentSpanId?: string | null;
  name: string;
  serviceName?: string;
  kind?: "server" | "client" | "internal";
  status?: "ok" | "error";
  startTime: string;
  endTime?: string;
  attributes?: Record<string, unknown>;
}

export interface TelemetryClient {
  log(level: string, message: string, metadata?: Record<string, unknown>): void;
  /** A log line tagged with `eventType` */
  event(eventType: string, message: string, metadata?: Record<string, unknown>, level?: string): void;
  metric(name: string, value: number, labels?: Record<string, unknown>): void;
  span(entry: SpanEntry): void;
  flush(): Promise<void>;
  /** Stops the timer and ships everything still queued */
  shutdown(): Promise<void>;
}
