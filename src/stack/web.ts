import type { StackConfig } from '../config/StackConfig';
import type { ServiceSpec } from '../supervisor/types';
import { StackConfigError } from '../util/errors';
import { baseSpec, candidates, fillTemplate, serviceUrl, templatePlaceholders } from './common';

const TEMPLATE_VALUES = [ 'port', 'host', 'workDir', 'metricsUrl' ] as const;

/**
 * The first-party dashboard/query service. It is managed like the external
 * services; its command line comes from the `args` template. A template that
 * passes `{metricsUrl}` makes the metrics server a hard dependency.
 */
export function createWebSpec(config: StackConfig): ServiceSpec {
  const settings = config.services.web;
  const template = settings.args ?? [];
  const placeholders = template.flatMap(templatePlaceholders);
  const unknown = placeholders.find((name) => !TEMPLATE_VALUES.some((known) => known === name));
  if (unknown !== undefined) {
    throw new StackConfigError(`Unknown placeholder {${unknown}} in services.web.args`);
  }
  const needsMetrics = placeholders.includes('metricsUrl');
  return {
    name: 'web',
    ...baseSpec(config, settings),
    executableCandidates: candidates(settings, './bin/web-dashboard', 'web-dashboard'),
    buildArgs: (port, ctx) => {
      const prometheusPort = ctx.upstream.get('prometheus');
      const values = {
        port: String(port),
        host: config.host,
        workDir: ctx.workDir,
        metricsUrl: prometheusPort === undefined ? undefined : serviceUrl(config.host, prometheusPort),
      };
      return template.map((arg) => fillTemplate(arg, values));
    },
    envOverlay: (port, ctx) => {
      const overlay: Record<string, string> = {
        HOST: config.host,
        PORT: String(port),
      };
      const prometheusPort = ctx.upstream.get('prometheus');
      const influxPort = ctx.upstream.get('influxdb');
      if (prometheusPort !== undefined) {
        overlay.METRICS_URL = serviceUrl(config.host, prometheusPort);
      }
      if (influxPort !== undefined) {
        overlay.INFLUX_URL = serviceUrl(config.host, influxPort);
      }
      return overlay;
    },
    healthCheck: {
      kind: 'http',
      paths: [ '/health' ],
      acceptedStatus: [ 200 ],
    },
    dependsOn: [
      needsMetrics ? { service: 'prometheus' } : { service: 'prometheus', optional: true },
      { service: 'influxdb', optional: true },
    ],
  };
}
