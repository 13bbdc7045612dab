import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadStackConfig, parsePortRange } from '../../src/config/StackConfig';
import { StackConfigError } from '../../src/util/errors';

describe('StackConfig', () => {
  describe('parsePortRange', () => {
    it('expands ranges and lists in order', () => {
      expect(parsePortRange('9090-9092')).toEqual([ 9090, 9091, 9092 ]);
      expect(parsePortRange('9090, 9095-9096')).toEqual([ 9090, 9095, 9096 ]);
      expect(parsePortRange(9090)).toEqual([ 9090 ]);
    });

    it('drops duplicates while keeping the first position', () => {
      expect(parsePortRange([ 9091, '9090-9091' ])).toEqual([ 9091, 9090 ]);
    });

    it('rejects malformed input', () => {
      expect(() => parsePortRange('9092-9090')).toThrow('Invalid port range: 9092-9090 runs backwards');
      expect(() => parsePortRange('70000')).toThrow('Invalid port 70000 in port range');
      expect(() => parsePortRange('abc')).toThrow('Invalid port range: abc');
      expect(() => parsePortRange('')).toThrow('Empty port range');
      expect(() => parsePortRange(true, '--web-ports')).toThrow(StackConfigError);
    });
  });

  describe('loadStackConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stackup-config-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    const writeJson = (name: string, value: unknown): void => {
      fs.writeFileSync(path.join(dir, name), JSON.stringify(value));
    };

    it('falls back to the built-in defaults', () => {
      const config = loadStackConfig({ cwd: dir, env: {}});

      expect(config.workDir).toBe(path.join(dir, '.stackup'));
      expect(config.host).toBe('127.0.0.1');
      expect(config.logLevel).toBe('info');
      expect(config.concurrent).toBe(false);
      expect(config.openBrowser).toBe(false);
      expect(config.services.grafana.ports[0]).toBe(3000);
      expect(config.services.grafana.ports.at(-1)).toBe(3010);
      expect(config.services.influxdb.ports).toHaveLength(11);
      expect(config.services.prometheus.required).toBe(false);
      expect(config.services.grafana.required).toBe(true);
      expect(config.services.web.args).toEqual([ '--host', '{host}', '--port', '{port}' ]);
    });

    it('reads stackup.config.json from the working directory', () => {
      writeJson('stackup.config.json', {
        host: '0.0.0.0',
        prometheusConfig: 'conf/prometheus.yml',
        services: {
          grafana: { ports: '3100-3101', required: false, executable: [ '/srv/grafana/bin/grafana-server' ]},
          web: { enabled: 'off', maxWaitMs: '5000' },
        },
      });

      const config = loadStackConfig({ cwd: dir, env: {}});

      expect(config.host).toBe('0.0.0.0');
      expect(config.prometheusConfig).toBe(path.join(dir, 'conf', 'prometheus.yml'));
      expect(config.services.grafana.ports).toEqual([ 3100, 3101 ]);
      expect(config.services.grafana.required).toBe(false);
      expect(config.services.grafana.executable).toEqual([ '/srv/grafana/bin/grafana-server' ]);
      expect(config.services.web.enabled).toBe(false);
      expect(config.services.web.maxWaitMs).toBe(5000);
    });

    it('lets the environment override the file', () => {
      writeJson('stackup.config.json', { host: '0.0.0.0', services: { grafana: { ports: '3100' }}});

      const config = loadStackConfig({
        cwd: dir,
        env: { STACKUP_GRAFANA_PORTS: '3200', STACKUP_HOST: '10.0.0.5', STACKUP_LOG_LEVEL: 'debug' },
      });

      expect(config.services.grafana.ports).toEqual([ 3200 ]);
      expect(config.host).toBe('10.0.0.5');
      expect(config.logLevel).toBe('debug');
    });

    it('lets command line flags override the environment', () => {
      const config = loadStackConfig({
        cwd: dir,
        env: { STACKUP_GRAFANA_EXE: '/env/grafana', STACKUP_LOG_LEVEL: 'debug' },
        overrides: {
          logLevel: 'warn',
          concurrent: true,
          services: { grafana: { enabled: false, ports: '3300', exe: '/custom/grafana' }},
        },
      });

      expect(config.logLevel).toBe('warn');
      expect(config.concurrent).toBe(true);
      expect(config.services.grafana.enabled).toBe(false);
      expect(config.services.grafana.ports).toEqual([ 3300 ]);
      expect(config.services.grafana.executable).toEqual([ '/custom/grafana', '/env/grafana' ]);
    });

    it('reads an env file without touching the process environment', () => {
      fs.writeFileSync(path.join(dir, '.env'), 'STACKUP_WORK_DIR=state\nGRAFANA_HOME=/opt/gf-test\n');
      const before = process.env.GRAFANA_HOME;

      const config = loadStackConfig({ cwd: dir, env: {}, envPath: '.env' });

      expect(config.workDir).toBe(path.join(dir, 'state'));
      expect(config.env.GRAFANA_HOME).toBe('/opt/gf-test');
      expect(process.env.GRAFANA_HOME).toBe(before);
    });

    it('reports a missing env file', () => {
      expect(() => loadStackConfig({ cwd: dir, env: {}, envPath: 'missing.env' }))
        .toThrow(`Env file not found: ${path.join(dir, 'missing.env')}`);
    });

    it('uses an explicit config path', () => {
      writeJson('custom.json', { logLevel: 'error' });

      expect(loadStackConfig({ cwd: dir, env: {}, configPath: 'custom.json' }).logLevel).toBe('error');
    });

    it('rejects unknown services', () => {
      writeJson('stackup.config.json', { services: { redis: {}}});

      expect(() => loadStackConfig({ cwd: dir, env: {}})).toThrow('Unknown service in config: redis');
    });

    it('rejects unreadable JSON', () => {
      fs.writeFileSync(path.join(dir, 'stackup.config.json'), '{ nope');

      expect(() => loadStackConfig({ cwd: dir, env: {}})).toThrow(StackConfigError);
    });

    it('rejects values of the wrong type', () => {
      writeJson('stackup.config.json', { services: { web: { enabled: 'maybe' }}});

      expect(() => loadStackConfig({ cwd: dir, env: {}}))
        .toThrow('Invalid boolean for services.web.enabled: "maybe"');
    });
  });
});
