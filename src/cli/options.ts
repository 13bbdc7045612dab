import type { Argv } from 'yargs';
import type { CliOverrides, LoadOptions } from '../config/StackConfig';

export interface StackArgs {
  config?: string;
  env?: string;
  'work-dir'?: string;
  'log-level'?: string;
  json: boolean;
  prometheus?: boolean;
  influxdb?: boolean;
  grafana?: boolean;
  web?: boolean;
  'prometheus-ports'?: string;
  'influxdb-ports'?: string;
  'grafana-ports'?: string;
  'web-ports'?: string;
  'prometheus-exe'?: string;
  'influxdb-exe'?: string;
  'grafana-exe'?: string;
  'web-exe'?: string;
}

export function withStackOptions(yargs: Argv<object>): Argv<StackArgs> {
  return yargs
    .option('config', {
      alias: 'c',
      type: 'string',
      description: 'Path to stackup.config.json',
    })
    .option('env', {
      alias: 'e',
      type: 'string',
      description: 'Path to .env file',
    })
    .option('work-dir', {
      type: 'string',
      description: 'Directory for data, logs and generated files',
    })
    .option('log-level', {
      type: 'string',
      choices: [ 'error', 'warn', 'info', 'verbose', 'debug', 'silly' ],
      description: 'Log level',
    })
    .option('json', {
      type: 'boolean',
      description: 'Output as JSON',
      default: false,
    })
    .option('prometheus', { type: 'boolean', description: 'Manage the metrics server (--no-prometheus to skip)' })
    .option('influxdb', { type: 'boolean', description: 'Manage the time-series database (--no-influxdb to skip)' })
    .option('grafana', { type: 'boolean', description: 'Manage the dashboard UI server (--no-grafana to skip)' })
    .option('web', { type: 'boolean', description: 'Manage the web dashboard service (--no-web to skip)' })
    .option('prometheus-ports', { type: 'string', description: 'Port range, e.g. 9090-9100' })
    .option('influxdb-ports', { type: 'string', description: 'Port range, e.g. 8086-8096' })
    .option('grafana-ports', { type: 'string', description: 'Port range, e.g. 3000-3010' })
    .option('web-ports', { type: 'string', description: 'Port range, e.g. 9300-9310' })
    .option('prometheus-exe', { type: 'string', description: 'Executable path or glob searched first' })
    .option('influxdb-exe', { type: 'string', description: 'Executable path or glob searched first' })
    .option('grafana-exe', { type: 'string', description: 'Executable path or glob searched first' })
    .option('web-exe', { type: 'string', description: 'Executable path or glob searched first' })
    .group([ 'prometheus', 'influxdb', 'grafana', 'web' ], 'Services:')
    .group([
      'prometheus-ports', 'influxdb-ports', 'grafana-ports', 'web-ports',
      'prometheus-exe', 'influxdb-exe', 'grafana-exe', 'web-exe',
    ], 'Overrides:');
}

export function toLoadOptions(args: StackArgs, extra: Omit<CliOverrides, 'services' | 'workDir' | 'logLevel'> = {}): LoadOptions {
  return {
    configPath: args.config,
    envPath: args.env,
    overrides: {
      ...extra,
      workDir: args['work-dir'],
      logLevel: args['log-level'],
      services: {
        prometheus: { enabled: args.prometheus, ports: args['prometheus-ports'], exe: args['prometheus-exe'] },
        influxdb: { enabled: args.influxdb, ports: args['influxdb-ports'], exe: args['influxdb-exe'] },
        grafana: { enabled: args.grafana, ports: args['grafana-ports'], exe: args['grafana-exe'] },
        web: { enabled: args.web, ports: args['web-ports'], exe: args['web-exe'] },
      },
    },
  };
}
