export interface MetricsConfig {
  serviceName: string;
  prefix?: string;
  collectDefaultMetrics?: boolean;
}
