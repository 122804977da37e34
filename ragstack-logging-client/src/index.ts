/**
 * @ragstack/logging-client
 *
 * In-memory queues of logs, events, metrics and spans, shipped in batches to
 * a telemetry endpoint on a timer.
 */

export * from "./types.js";
export * from "./client.js";
export * from "./config.js";
export * from "./metrics.js";
export { BatchQueue } from "./queue.js";
