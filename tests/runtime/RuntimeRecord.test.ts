import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ServiceReport, StackReport } from '../../src/orchestrator/Orchestrator';
import {
  deleteRuntimeRecord,
  getRuntimeFilePath,
  isProcessRunning,
  loadRuntimeRecord,
  saveRuntimeRecord,
  toRuntimeRecord,
} from '../../src/runtime/RuntimeRecord';

function service(overrides: Partial<ServiceReport> = {}): ServiceReport {
  return {
    status: 'healthy',
    required: true,
    port: 3000,
    url: 'http://127.0.0.1:3000',
    ownedByUs: false,
    softSuccess: false,
    attemptedPorts: [],
    ...overrides,
  };
}

function stack(services: Record<string, ServiceReport>): StackReport {
  return { startTime: '2026-02-03T04:05:06.000Z', services, ok: true, exitCode: 0 };
}

describe('RuntimeRecord', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stackup-runtime-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('round-trips through the work directory', () => {
    const record = toRuntimeRecord(stack({ grafana: service({ ownedByUs: true, pid: 77 }) }));

    saveRuntimeRecord(dir, record);

    expect(getRuntimeFilePath(dir)).toBe(path.join(dir, 'runtime.json'));
    expect(loadRuntimeRecord(dir)).toEqual(record);
    expect(record.schemaVersion).toBe('1.0');
    expect(record.pid).toBe(process.pid);
  });

  it('keeps ownership of a service started by an earlier run', () => {
    const previous = toRuntimeRecord(stack({ grafana: service({ ownedByUs: true, pid: 77, logFile: '/tmp/grafana.log' }) }));

    const next = toRuntimeRecord(stack({ grafana: service() }), previous);

    expect(next.services.grafana).toMatchObject({ ownedByUs: true, pid: 77, logFile: '/tmp/grafana.log' });
  });

  it('drops ownership when the service moved to another port', () => {
    const previous = toRuntimeRecord(stack({ grafana: service({ ownedByUs: true, pid: 77 }) }));

    const next = toRuntimeRecord(stack({ grafana: service({ port: 3001 }) }), previous);

    expect(next.services.grafana.ownedByUs).toBe(false);
    expect(next.services.grafana.pid).toBeUndefined();
  });

  it('ignores a missing or corrupt record', () => {
    expect(loadRuntimeRecord(dir)).toBeUndefined();

    fs.writeFileSync(getRuntimeFilePath(dir), '{"schemaVersion":"0.1"}');
    expect(loadRuntimeRecord(dir)).toBeUndefined();

    fs.writeFileSync(getRuntimeFilePath(dir), 'not json');
    expect(loadRuntimeRecord(dir)).toBeUndefined();
  });

  it('deletes the record', () => {
    saveRuntimeRecord(dir, toRuntimeRecord(stack({})));

    deleteRuntimeRecord(dir);

    expect(fs.existsSync(getRuntimeFilePath(dir))).toBe(false);
  });

  it('checks whether a pid is alive', () => {
    expect(isProcessRunning(process.pid)).toBe(true);
    expect(isProcessRunning(undefined)).toBe(false);
    expect(isProcessRunning(-1)).toBe(false);
  });
});
