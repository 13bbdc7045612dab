import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runStack } from '../../src/cli/lib/stack';
import type { LoadOptions } from '../../src/config/StackConfig';
import { getRuntimeFilePath } from '../../src/runtime/RuntimeRecord';
import { FakeLauncher, FakePortRegistry, FakeProbe, FakeResolver, VirtualClock } from '../helpers/stack';

// Keep the test logger; the CLI one writes rotating files into the work dir
vi.mock('../../src/cli/lib/logger', () => ({
  initLogger: vi.fn(),
}));

describe('runStack', () => {
  let dir: string;
  let ports: FakePortRegistry;
  let launcher: FakeLauncher;
  let printed: string[];

  const load = (extra: Partial<LoadOptions> = {}): LoadOptions => ({
    cwd: dir,
    env: {},
    ...extra,
    overrides: { logLevel: 'error', ...extra.overrides },
  });

  const collaborators = () => ({
    ports,
    launcher,
    resolver: new FakeResolver(),
    probe: new FakeProbe((port) => ports.owners.has(port)),
    clock: new VirtualClock(),
  });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stackup-run-'));
    ports = new FakePortRegistry();
    launcher = new FakeLauncher();
    printed = [];
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const runAll = (): void => {
    ports.bind(9090, 'prometheus').bind(8086, 'influxd').bind(3000, 'grafana-server').bind(9300, 'web-dashboard');
  };

  it('adopts a running stack, records it and prints the summary', async () => {
    runAll();

    const code = await runStack(load(), {
      detectOnly: false,
      json: false,
      orchestrator: collaborators(),
      print: (text) => printed.push(text),
    });

    expect(code).toBe(0);
    expect(launcher.launches).toHaveLength(0);
    expect(printed[0].split('\n')[0]).toBe('--- Observability Stack Summary ---');
    const saved: unknown = JSON.parse(fs.readFileSync(getRuntimeFilePath(path.join(dir, '.stackup')), 'utf-8'));
    expect(saved).toMatchObject({ schemaVersion: '1.0', services: { grafana: { status: 'healthy', port: 3000 }}});
  });

  it('prints the report as JSON', async () => {
    runAll();

    await runStack(load(), { detectOnly: false, json: true, orchestrator: collaborators(), print: (text) => printed.push(text) });

    const report: unknown = JSON.parse(printed[0]);
    expect(report).toMatchObject({ ok: true, exitCode: 0, services: { web: { url: 'http://127.0.0.1:9300' }}});
  });

  it('opens the dashboard UI when asked', async () => {
    runAll();
    const open = vi.fn(async (): Promise<boolean> => true);

    await runStack(load({ overrides: { open: true }}), {
      detectOnly: false,
      json: false,
      orchestrator: collaborators(),
      open,
      print: (text) => printed.push(text),
    });

    expect(open).toHaveBeenCalledWith('http://127.0.0.1:3000');
  });

  it('exits 3 and writes no record when a check finds nothing', async () => {
    const code = await runStack(load(), {
      detectOnly: true,
      json: false,
      orchestrator: collaborators(),
      print: (text) => printed.push(text),
    });

    expect(code).toBe(3);
    expect(launcher.launches).toHaveLength(0);
    expect(fs.existsSync(getRuntimeFilePath(path.join(dir, '.stackup')))).toBe(false);
    expect(printed[0].split('\n')).toContain('  - grafana: not running; start it with `stackup up`');
  });

  it('exits 20 on a configuration error', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const code = await runStack(load({ configPath: 'missing.json' }), { detectOnly: false, json: false });

    expect(code).toBe(20);
    expect(error).toHaveBeenCalledTimes(1);
  });
});
