import { SERVICE_NAMES, type ServiceName, type StackConfig } from '../config/StackConfig';
import type { ServiceSpec } from '../supervisor/types';
import { createGrafanaSpec } from './grafana';
import { createInfluxSpec } from './influxdb';
import { createPrometheusSpec } from './prometheus';
import { createWebSpec } from './web';

const FACTORIES: Record<ServiceName, (config: StackConfig) => ServiceSpec> = {
  prometheus: createPrometheusSpec,
  influxdb: createInfluxSpec,
  grafana: createGrafanaSpec,
  web: createWebSpec,
};

export interface StackPlan {
  /** Enabled services in dependency order. */
  services: ServiceSpec[];
  disabled: ServiceName[];
}

export function planStack(config: StackConfig): StackPlan {
  const services: ServiceSpec[] = [];
  const disabled: ServiceName[] = [];
  for (const name of SERVICE_NAMES) {
    if (config.services[name].enabled) {
      services.push(FACTORIES[name](config));
    } else {
      disabled.push(name);
    }
  }
  return { services, disabled };
}

export { createGrafanaSpec } from './grafana';
export { createInfluxSpec } from './influxdb';
export { createPrometheusSpec } from './prometheus';
export { createWebSpec } from './web';
