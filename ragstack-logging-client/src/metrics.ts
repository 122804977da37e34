import type { MetricDefinition } from "./types.js";

export const METRIC_DEFINITIONS: Record<string, MetricDefinition> = {
  "service.request.count": {
    type: "counter",
    description: "Total HTTP requests",
  },
  "service.error.count": {
    type: "counter",
    description: "Total HTTP errors",
  },
  "service.request.latency_ms": {
    type: "histogram",
    description: "HTTP request latency (ms)",
  },
  "workflow.execution.count": {
    type: "counter",
    description: "Workflow executions started",
  },
  "workflow.execution.latency_ms": {
    type: "histogram",
    description: "Workflow execution latency (ms)",
  },
  "workflow.node.latency_ms": {
    type: "histogram",
    description: "Node invocation latency (ms)",
  },
  "workflow.node.error.count": {
    type: "counter",
    description: "Node invocations that ended in error",
  },
};

/**
 * Get metric definition, falling back to gauge for custom metrics
 */
export function getMetricDefinition(name: string): MetricDefinition {
  return METRIC_DEFINITIONS[name] ?? { type: "gauge", description: "Custom metric" };
}
