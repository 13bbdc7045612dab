import path from 'node:path';
import type { StackConfig } from '../config/StackConfig';
import type { ServiceSpec } from '../supervisor/types';
import { baseSpec, candidates } from './common';

export function createInfluxSpec(config: StackConfig): ServiceSpec {
  const settings = config.services.influxdb;
  return {
    name: 'influxdb',
    ...baseSpec(config, settings),
    executableCandidates: candidates(settings,
      config.env.INFLUXD_EXE,
      '/opt/influxdb*/influxd',
      '~/influxdb*/influxd',
      '/usr/local/bin/influxd',
      'influxd'),
    buildArgs: (port, ctx) => {
      const dataDir = path.join(ctx.workDir, 'data', 'influxdb');
      return [
        `--http-bind-address=${config.host}:${port}`,
        `--bolt-path=${path.join(dataDir, 'influxd.bolt')}`,
        `--engine-path=${path.join(dataDir, 'engine')}`,
      ];
    },
    envOverlay: () => ({}),
    // Auth-guarded endpoints still prove the server is serving
    healthCheck: {
      kind: 'http',
      paths: [ '/health', '/ping' ],
      acceptedStatus: [ 200, 204, 401, 403 ],
      schemes: [ 'http', 'https' ],
    },
    dependsOn: [],
  };
}
