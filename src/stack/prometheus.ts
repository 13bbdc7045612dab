import path from 'node:path';
import type { StackConfig } from '../config/StackConfig';
import type { ServiceSpec } from '../supervisor/types';
import { baseSpec, candidates, underHome } from './common';
import { ensurePrometheusConfig } from './PrometheusConfig';

export function prometheusConfigFile(config: StackConfig): string {
  return config.prometheusConfig ?? path.join(config.workDir, 'prometheus', 'prometheus.yml');
}

export function createPrometheusSpec(config: StackConfig): ServiceSpec {
  const settings = config.services.prometheus;
  const configFile = prometheusConfigFile(config);
  return {
    name: 'prometheus',
    ...baseSpec(config, settings),
    executableCandidates: candidates(settings,
      underHome(config.env.PROMETHEUS_HOME, 'prometheus'),
      '/opt/prometheus-*/prometheus',
      '~/prometheus-*/prometheus',
      '/usr/local/bin/prometheus',
      'prometheus'),
    buildArgs: (port, ctx) => [
      `--config.file=${configFile}`,
      `--web.listen-address=${config.host}:${port}`,
      `--storage.tsdb.path=${path.join(ctx.workDir, 'data', 'prometheus')}`,
    ],
    envOverlay: () => ({}),
    prepare: async (port) => {
      await ensurePrometheusConfig({
        file: configFile,
        host: config.host,
        port,
        overwrite: config.prometheusConfig === undefined,
      });
    },
    healthCheck: {
      kind: 'http',
      paths: [ '/-/ready', '/api/v1/status/runtimeinfo' ],
      acceptedStatus: [ 200 ],
    },
    dependsOn: [],
  };
}
