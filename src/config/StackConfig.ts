import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { StackConfigError } from '../util/errors';

export const SERVICE_NAMES = [ 'prometheus', 'influxdb', 'grafana', 'web' ] as const;
export type ServiceName = typeof SERVICE_NAMES[number];

export const DEFAULT_CONFIG_FILE = 'stackup.config.json';

export interface ServiceSettings {
  enabled: boolean;
  required: boolean;
  ports: number[];
  /** Searched before the built-in candidates. */
  executable: string[];
  owners: string[];
  settleDelayMs: number;
  probeIntervalMs: number;
  maxWaitMs: number;
  softSuccess: boolean;
  /** Argument template; only the first-party service takes one. */
  args?: string[];
}

export interface StackConfig {
  workDir: string;
  host: string;
  logLevel: string;
  concurrent: boolean;
  openBrowser: boolean;
  prometheusConfig?: string;
  dashboardsDir?: string;
  /** Process environment merged with the env file; read-only input for candidates and overlays. */
  env: Record<string, string>;
  services: Record<ServiceName, ServiceSettings>;
}

export interface ServiceOverride {
  enabled?: boolean;
  ports?: string;
  exe?: string;
}

export interface CliOverrides {
  workDir?: string;
  logLevel?: string;
  concurrent?: boolean;
  open?: boolean;
  services?: Partial<Record<ServiceName, ServiceOverride>>;
}

export interface LoadOptions {
  cwd?: string;
  configPath?: string;
  envPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: CliOverrides;
}

const BASE_SERVICES: Record<ServiceName, ServiceSettings> = {
  prometheus: {
    enabled: true,
    required: false,
    ports: range(9090, 9100),
    executable: [],
    owners: [ 'prometheus' ],
    settleDelayMs: 1500,
    probeIntervalMs: 500,
    maxWaitMs: 20_000,
    softSuccess: true,
  },
  influxdb: {
    enabled: true,
    required: false,
    ports: range(8086, 8096),
    executable: [],
    owners: [ 'influxd' ],
    settleDelayMs: 2000,
    probeIntervalMs: 1000,
    maxWaitMs: 30_000,
    softSuccess: true,
  },
  grafana: {
    enabled: true,
    required: true,
    ports: range(3000, 3010),
    executable: [],
    owners: [ 'grafana-server', 'grafana' ],
    settleDelayMs: 3000,
    probeIntervalMs: 1000,
    maxWaitMs: 45_000,
    softSuccess: true,
  },
  web: {
    enabled: true,
    required: true,
    ports: range(9300, 9310),
    executable: [],
    owners: [ 'web-dashboard' ],
    settleDelayMs: 1000,
    probeIntervalMs: 500,
    maxWaitMs: 15_000,
    softSuccess: true,
    args: [ '--host', '{host}', '--port', '{port}' ],
  },
};

function range(from: number, to: number): number[] {
  const ports: number[] = [];
  for (let port = from; port <= to; port++) {
    ports.push(port);
  }
  return ports;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkPort(port: number, source: string): number {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new StackConfigError(`Invalid port ${port} in ${source}`);
  }
  return port;
}

/**
 * Accepts `9090`, `"9090-9100"`, `"9090,9095-9096"` or an array of such entries.
 * Order is preserved and duplicates dropped.
 */
export function parsePortRange(value: unknown, source = 'port range'): number[] {
  const ports: number[] = [];
  const add = (port: number): void => {
    if (!ports.includes(port)) {
      ports.push(port);
    }
  };
  const parsePart = (part: unknown): void => {
    if (typeof part === 'number') {
      add(checkPort(part, source));
      return;
    }
    if (typeof part !== 'string') {
      throw new StackConfigError(`Invalid ${source}: ${JSON.stringify(part)}`);
    }
    for (const piece of part.split(',').map((p) => p.trim()).filter((p) => p.length > 0)) {
      const match = /^(\d+)(?:\s*-\s*(\d+))?$/u.exec(piece);
      if (!match) {
        throw new StackConfigError(`Invalid ${source}: ${piece}`);
      }
      const start = checkPort(parseInt(match[1], 10), source);
      const end = match[2] === undefined ? start : checkPort(parseInt(match[2], 10), source);
      if (end < start) {
        throw new StackConfigError(`Invalid ${source}: ${piece} runs backwards`);
      }
      for (let port = start; port <= end; port++) {
        add(port);
      }
    }
  };

  if (Array.isArray(value)) {
    value.forEach(parsePart);
  } else {
    parsePart(value);
  }
  if (ports.length === 0) {
    throw new StackConfigError(`Empty ${source}`);
  }
  return ports;
}

function normalizeBoolean(value: unknown, fallback: boolean, source: string): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    if ([ 'true', '1', 'yes', 'on' ].includes(lower)) {
      return true;
    }
    if ([ 'false', '0', 'no', 'off' ].includes(lower)) {
      return false;
    }
  }
  throw new StackConfigError(`Invalid boolean for ${source}: ${JSON.stringify(value)}`);
}

function normalizeDuration(value: unknown, fallback: number, source: string): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) {
    throw new StackConfigError(`Invalid duration for ${source}: ${JSON.stringify(value)}`);
  }
  return parsed;
}

function normalizeStringList(value: unknown, source: string): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value.split(',').map((v) => v.trim()).filter((v) => v.length > 0);
  }
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
    return [ ...value ];
  }
  throw new StackConfigError(`Invalid list for ${source}: ${JSON.stringify(value)}`);
}

function normalizeString(value: unknown, source: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || !value.trim()) {
    throw new StackConfigError(`Invalid value for ${source}: ${JSON.stringify(value)}`);
  }
  return value.trim();
}

function mergeService(name: ServiceName, base: ServiceSettings, raw: unknown): ServiceSettings {
  if (raw === undefined) {
    return base;
  }
  if (!isRecord(raw)) {
    throw new StackConfigError(`services.${name} must be an object`);
  }
  const key = (field: string): string => `services.${name}.${field}`;
  return {
    enabled: normalizeBoolean(raw.enabled, base.enabled, key('enabled')),
    required: normalizeBoolean(raw.required, base.required, key('required')),
    ports: raw.ports === undefined ? base.ports : parsePortRange(raw.ports, key('ports')),
    executable: normalizeStringList(raw.executable, key('executable')) ?? base.executable,
    owners: normalizeStringList(raw.owners, key('owners')) ?? base.owners,
    settleDelayMs: normalizeDuration(raw.settleDelayMs, base.settleDelayMs, key('settleDelayMs')),
    probeIntervalMs: normalizeDuration(raw.probeIntervalMs, base.probeIntervalMs, key('probeIntervalMs')),
    maxWaitMs: normalizeDuration(raw.maxWaitMs, base.maxWaitMs, key('maxWaitMs')),
    softSuccess: normalizeBoolean(raw.softSuccess, base.softSuccess, key('softSuccess')),
    args: raw.args === undefined ? base.args : normalizeStringList(raw.args, key('args')),
  };
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error: unknown) {
    throw new StackConfigError(`Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new StackConfigError(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

function readEnv(env: NodeJS.ProcessEnv, envPath: string | undefined): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const [ key, value ] of Object.entries(env)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  if (envPath) {
    if (!fs.existsSync(envPath)) {
      throw new StackConfigError(`Env file not found: ${envPath}`);
    }
    Object.assign(merged, dotenv.parse(fs.readFileSync(envPath)));
  }
  return merged;
}

function envKey(name: ServiceName, suffix: string): string {
  return `STACKUP_${name.toUpperCase()}_${suffix}`;
}

/**
 * Builds the effective configuration.
 * Later layers win: defaults, JSON config file, environment (with env file), CLI overrides.
 */
export function loadStackConfig(options: LoadOptions = {}): StackConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = readEnv(options.env ?? process.env, options.envPath ? path.resolve(cwd, options.envPath) : undefined);
  const overrides = options.overrides ?? {};

  let file: Record<string, unknown> = {};
  if (options.configPath) {
    file = readConfigFile(path.resolve(cwd, options.configPath));
  } else if (fs.existsSync(path.join(cwd, DEFAULT_CONFIG_FILE))) {
    file = readConfigFile(path.join(cwd, DEFAULT_CONFIG_FILE));
  }

  const fileServices = file.services === undefined ? {} : file.services;
  if (!isRecord(fileServices)) {
    throw new StackConfigError('services must be an object');
  }
  for (const key of Object.keys(fileServices)) {
    if (!SERVICE_NAMES.some((name) => name === key)) {
      throw new StackConfigError(`Unknown service in config: ${key}`);
    }
  }

  const build = (name: ServiceName): ServiceSettings => {
    let settings = mergeService(name, BASE_SERVICES[name], fileServices[name]);

    const envPorts = env[envKey(name, 'PORTS')];
    const envExe = env[envKey(name, 'EXE')];
    if (envPorts) {
      settings = { ...settings, ports: parsePortRange(envPorts, envKey(name, 'PORTS')) };
    }
    if (envExe) {
      settings = { ...settings, executable: [ envExe, ...settings.executable ] };
    }

    const cli = overrides.services?.[name];
    if (cli?.enabled !== undefined) {
      settings = { ...settings, enabled: cli.enabled };
    }
    if (cli?.ports) {
      settings = { ...settings, ports: parsePortRange(cli.ports, `--${name}-ports`) };
    }
    if (cli?.exe) {
      settings = { ...settings, executable: [ cli.exe, ...settings.executable ] };
    }
    return settings;
  };
  const services: Record<ServiceName, ServiceSettings> = {
    prometheus: build('prometheus'),
    influxdb: build('influxdb'),
    grafana: build('grafana'),
    web: build('web'),
  };

  const workDir = path.resolve(cwd,
    overrides.workDir ?? env.STACKUP_WORK_DIR ?? normalizeString(file.workDir, 'workDir') ?? '.stackup');
  const prometheusConfig = normalizeString(file.prometheusConfig, 'prometheusConfig');
  const dashboardsDir = normalizeString(file.dashboardsDir, 'dashboardsDir');

  return {
    workDir,
    host: env.STACKUP_HOST ?? normalizeString(file.host, 'host') ?? '127.0.0.1',
    logLevel: overrides.logLevel ?? env.STACKUP_LOG_LEVEL ?? normalizeString(file.logLevel, 'logLevel') ?? 'info',
    concurrent: overrides.concurrent ?? normalizeBoolean(file.concurrent, false, 'concurrent'),
    openBrowser: overrides.open ?? normalizeBoolean(file.openBrowser, false, 'openBrowser'),
    prometheusConfig: prometheusConfig ? path.resolve(cwd, prometheusConfig) : undefined,
    dashboardsDir: dashboardsDir ? path.resolve(cwd, dashboardsDir) : undefined,
    env,
    services,
  };
}
