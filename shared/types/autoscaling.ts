/**
 * Horizontal pod autoscaler status types
 */

export interface AutoscalingMetric {
  name: string;
  targetValue?: string;
  currentValue?: string;
}

export interface AutoscalingStatus {
  minInstances: number;
  maxInstances: number;
  metrics: AutoscalingMetric[];
  desiredReplicas: number;
  lastScaleTime: string;
}
