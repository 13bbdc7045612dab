import type { RuntimeRecord } from '../../runtime/RuntimeRecord';
import { isProcessRunning } from '../../runtime/RuntimeRecord';
import type { HealthProbe } from '../../supervisor/HealthProbe';
import type { ProcessLauncher } from '../../supervisor/ProcessLauncher';
import type { ServiceSpec } from '../../supervisor/types';
import { errorMessage } from '../../util/errors';

export const EXIT_NOT_RUNNING = 10;

export interface LiveServiceStatus {
  name: string;
  required: boolean;
  healthy: boolean;
  port?: number;
  url?: string;
  pid?: number;
  /** Recorded pid still alive; undefined when nothing was recorded. */
  pidRunning?: boolean;
  ownedByUs: boolean;
  detail?: string;
}

export interface StopOutcome {
  stopped: string[];
  skipped: string[];
  failed: string[];
}

/** Re-probes every port the last run recorded as healthy. */
export async function inspectStack(
  specs: ServiceSpec[],
  record: RuntimeRecord | undefined,
  probe: HealthProbe,
  isRunning: (pid?: number) => boolean = isProcessRunning,
): Promise<LiveServiceStatus[]> {
  return Promise.all(specs.map(async (spec): Promise<LiveServiceStatus> => {
    const recorded = record?.services[spec.name];
    const base = {
      name: spec.name,
      required: spec.required,
      ownedByUs: recorded?.ownedByUs ?? false,
      pid: recorded?.pid,
      pidRunning: recorded?.pid === undefined ? undefined : isRunning(recorded.pid),
    };
    if (recorded?.port === undefined) {
      return { ...base, healthy: false, detail: recorded ? `last run ended as ${recorded.status}` : 'not recorded' };
    }

    const result = await probe.probe({
      host: spec.host,
      port: recorded.port,
      check: spec.healthCheck,
      timeoutMs: spec.requestTimeoutMs,
    });
    return {
      ...base,
      healthy: result.healthy,
      port: recorded.port,
      url: recorded.url,
      detail: result.healthy ? undefined : result.detail ?? 'unhealthy',
    };
  }));
}

export function formatStatus(entries: LiveServiceStatus[]): string {
  if (entries.length === 0) {
    return 'No services enabled.';
  }
  const width = Math.max(8, ...entries.map((entry) => entry.name.length));
  return entries.map((entry) => {
    const icon = entry.healthy ? '●' : '○';
    const where = entry.url ?? (entry.port === undefined ? '-' : `port ${entry.port}`);
    const pid = entry.pid === undefined ? '' : ` pid=${entry.pid}${entry.pidRunning ? '' : ' (gone)'}`;
    const detail = entry.detail ? ` (${entry.detail})` : '';
    return `${icon} ${entry.name.padEnd(width)} ${entry.healthy ? 'up' : 'down'} ${where}${pid}${detail}`;
  }).join('\n');
}

/**
 * Terminates the services a previous run started. Adopted services and
 * pids that already exited are left alone.
 */
export async function stopRecordedServices(
  record: RuntimeRecord,
  launcher: Pick<ProcessLauncher, 'terminate'>,
  isRunning: (pid?: number) => boolean = isProcessRunning,
  onError: (name: string, message: string) => void = (): void => undefined,
): Promise<StopOutcome> {
  const outcome: StopOutcome = { stopped: [], skipped: [], failed: []};
  for (const [ name, service ] of Object.entries(record.services)) {
    if (!service.ownedByUs || service.pid === undefined || !isRunning(service.pid)) {
      outcome.skipped.push(name);
      continue;
    }
    try {
      await launcher.terminate({ pid: service.pid, command: service.executable ?? name, args: []});
      outcome.stopped.push(name);
    } catch (error: unknown) {
      onError(name, errorMessage(error));
      outcome.failed.push(name);
    }
  }
  return outcome;
}
