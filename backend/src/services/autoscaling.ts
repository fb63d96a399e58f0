import type * as k8s from '@kubernetes/client-node';
import type { AutoscalingMetric, AutoscalingStatus } from '@fleetstat/shared';
import type { OrchestrationClient } from './types';

/**
 * Reported when the instance has autoscaling configured but no HPA exists
 */
export const AUTOSCALER_NOT_FOUND: AutoscalingStatus = {
  minInstances: -1,
  maxInstances: -1,
  metrics: [],
  desiredReplicas: -1,
  lastScaleTime: 'unknown (could not find HPA object)',
};

type MetricValue = Pick<k8s.V2MetricTarget, 'value' | 'averageValue' | 'averageUtilization'>;

/**
 * Utilization targets render as percentages, quantities as given
 */
function formatValue(value: MetricValue | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  if (value.averageUtilization !== undefined) {
    return `${value.averageUtilization}%`;
  }
  return value.averageValue ?? value.value;
}

interface NamedValue {
  name: string;
  value: MetricValue | undefined;
}

function parseTarget(spec: k8s.V2MetricSpec): NamedValue | null {
  if (spec.resource) return { name: spec.resource.name, value: spec.resource.target };
  if (spec.containerResource) return { name: spec.containerResource.name, value: spec.containerResource.target };
  if (spec.pods) return { name: spec.pods.metric.name, value: spec.pods.target };
  if (spec.object) return { name: spec.object.metric.name, value: spec.object.target };
  if (spec.external) return { name: spec.external.metric.name, value: spec.external.target };
  return null;
}

function parseCurrent(status: k8s.V2MetricStatus): NamedValue | null {
  if (status.resource) return { name: status.resource.name, value: status.resource.current };
  if (status.containerResource) return { name: status.containerResource.name, value: status.containerResource.current };
  if (status.pods) return { name: status.pods.metric.name, value: status.pods.current };
  if (status.object) return { name: status.object.metric.name, value: status.object.current };
  if (status.external) return { name: status.external.metric.name, value: status.external.current };
  return null;
}

/**
 * Merge target and current metrics by name: targets first, then current
 * values; a metric seen on only one side keeps the other field unset
 */
export function parseAutoscalerMetrics(hpa: k8s.V2HorizontalPodAutoscaler): AutoscalingMetric[] {
  const metricsByName = new Map<string, AutoscalingMetric>();
  const metric = (name: string): AutoscalingMetric => {
    const existing = metricsByName.get(name);
    if (existing) {
      return existing;
    }
    const created: AutoscalingMetric = { name };
    metricsByName.set(name, created);
    return created;
  };

  for (const spec of hpa.spec?.metrics || []) {
    const parsed = parseTarget(spec);
    if (parsed) {
      metric(parsed.name).targetValue = formatValue(parsed.value);
    }
  }

  for (const status of hpa.status?.currentMetrics || []) {
    const parsed = parseCurrent(status);
    if (parsed) {
      metric(parsed.name).currentValue = formatValue(parsed.value);
    }
  }

  return Array.from(metricsByName.values());
}

export function toAutoscalingStatus(hpa: k8s.V2HorizontalPodAutoscaler): AutoscalingStatus {
  const lastScaleTime = hpa.status?.lastScaleTime;
  return {
    minInstances: hpa.spec?.minReplicas ?? 1,
    maxInstances: hpa.spec?.maxReplicas ?? -1,
    metrics: parseAutoscalerMetrics(hpa),
    desiredReplicas: hpa.status?.desiredReplicas ?? -1,
    lastScaleTime: lastScaleTime ? lastScaleTime.toISOString() : 'N/A',
  };
}

/**
 * Autoscaling status of the workload `name`; the not-found sentinel when
 * there is no autoscaler
 */
export async function autoscalingStatus(
  kube: OrchestrationClient,
  name: string,
  namespace: string
): Promise<AutoscalingStatus> {
  const hpa = await kube.getAutoscaler(name, namespace);
  return hpa ? toAutoscalingStatus(hpa) : { ...AUTOSCALER_NOT_FOUND, metrics: [] };
}
