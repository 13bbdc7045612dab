import fs from 'node:fs';
import path from 'node:path';
import type { ServiceReport, StackReport } from '../orchestrator/Orchestrator';

export interface RuntimeRecord {
  schemaVersion: '1.0';
  pid: number;
  startTime: string;
  services: Record<string, ServiceReport>;
}

export function getRuntimeFilePath(workDir: string): string {
  return path.join(workDir, 'runtime.json');
}

/**
 * Builds the record for a finished run. A service this run merely adopted keeps
 * the pid of the earlier run that started it, so `stop` can still find it.
 */
export function toRuntimeRecord(report: StackReport, previous?: RuntimeRecord): RuntimeRecord {
  const services: Record<string, ServiceReport> = {};
  for (const [ name, service ] of Object.entries(report.services)) {
    const before = previous?.services[name];
    if (before?.ownedByUs && before.pid !== undefined &&
      service.status === 'healthy' && !service.ownedByUs && service.port === before.port) {
      services[name] = { ...service, ownedByUs: true, pid: before.pid, logFile: before.logFile };
    } else {
      services[name] = service;
    }
  }
  return {
    schemaVersion: '1.0',
    pid: process.pid,
    startTime: report.startTime,
    services,
  };
}

export function saveRuntimeRecord(workDir: string, record: RuntimeRecord): void {
  const filePath = getRuntimeFilePath(workDir);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(record, null, 2), 'utf-8');
}

function isRuntimeRecord(value: unknown): value is RuntimeRecord {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return 'schemaVersion' in value && value.schemaVersion === '1.0' &&
    'services' in value && typeof value.services === 'object' && value.services !== null;
}

export function loadRuntimeRecord(workDir: string): RuntimeRecord | undefined {
  const filePath = getRuntimeFilePath(workDir);
  if (!fs.existsSync(filePath)) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    return isRuntimeRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export function deleteRuntimeRecord(workDir: string): void {
  const filePath = getRuntimeFilePath(workDir);
  if (fs.existsSync(filePath)) {
    fs.unlinkSync(filePath);
  }
}

export function isProcessRunning(pid?: number): boolean {
  if (!pid || pid <= 0) {
    return false;
  }

  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
