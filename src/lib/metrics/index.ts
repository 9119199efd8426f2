export { createMetricsSink, type MetricsSink, type MetricsSnapshot } from "./metrics-sink";
