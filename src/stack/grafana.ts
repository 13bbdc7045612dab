import path from 'node:path';
import type { StackConfig } from '../config/StackConfig';
import type { LaunchContext, ServiceSpec } from '../supervisor/types';
import { baseSpec, candidates, underHome } from './common';
import { writeGrafanaProvisioning } from './GrafanaProvisioning';

export interface GrafanaPaths {
  home: string;
  data: string;
  logs: string;
  plugins: string;
  provisioning: string;
  dashboards: string;
}

// deb and rpm packages install the binary apart from its home
const PACKAGED_BIN_DIRS = [ '/usr/sbin', '/usr/bin' ];
const PACKAGED_HOME = '/usr/share/grafana';

/** `GRAFANA_HOME`, else the packaged home, else `<home>/bin/grafana-server`. */
export function grafanaHome(config: StackConfig, executable: string): string {
  if (config.env.GRAFANA_HOME) {
    return config.env.GRAFANA_HOME;
  }
  const binDir = path.dirname(executable);
  return PACKAGED_BIN_DIRS.includes(binDir) ? PACKAGED_HOME : path.resolve(binDir, '..');
}

export function grafanaPaths(config: StackConfig, ctx: LaunchContext): GrafanaPaths {
  const root = path.join(ctx.workDir, 'grafana');
  return {
    home: grafanaHome(config, ctx.executable),
    data: path.join(root, 'data'),
    logs: path.join(root, 'logs'),
    plugins: path.join(root, 'plugins'),
    provisioning: path.join(root, 'provisioning'),
    dashboards: config.dashboardsDir ?? path.join(root, 'dashboards'),
  };
}

export function createGrafanaSpec(config: StackConfig): ServiceSpec {
  const settings = config.services.grafana;
  return {
    name: 'grafana',
    ...baseSpec(config, settings),
    executableCandidates: candidates(settings,
      underHome(config.env.GRAFANA_HOME, 'bin', 'grafana-server'),
      '/opt/grafana-*/bin/grafana-server',
      '~/grafana-*/bin/grafana-server',
      '/usr/sbin/grafana-server',
      'grafana-server'),
    buildArgs: (_port, ctx) => [ '--homepath', grafanaPaths(config, ctx).home ],
    envOverlay: (port, ctx) => {
      const paths = grafanaPaths(config, ctx);
      return {
        GF_SERVER_HTTP_ADDR: config.host,
        GF_SERVER_HTTP_PORT: String(port),
        GF_PATHS_DATA: paths.data,
        GF_PATHS_LOGS: paths.logs,
        GF_PATHS_PLUGINS: paths.plugins,
        GF_PATHS_PROVISIONING: paths.provisioning,
      };
    },
    prepare: async (_port, ctx) => {
      const prometheusPort = ctx.upstream.get('prometheus');
      if (prometheusPort === undefined) {
        throw new Error('prometheus port is not available');
      }
      const paths = grafanaPaths(config, ctx);
      await writeGrafanaProvisioning({
        provisioningDir: paths.provisioning,
        dashboardsDir: paths.dashboards,
        host: config.host,
        prometheusPort,
        influxPort: ctx.upstream.get('influxdb'),
      });
    },
    healthCheck: {
      kind: 'http',
      paths: [ '/api/health' ],
      acceptedStatus: [ 200 ],
    },
    dependsOn: [
      { service: 'prometheus' },
      { service: 'influxdb', optional: true },
    ],
  };
}
