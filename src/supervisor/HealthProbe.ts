import net from 'node:net';
import { getLoggerFor } from 'global-logger-factory';
import type { HealthCheck, HttpHealthCheck, HttpScheme } from './types';

export interface ProbeResult {
  healthy: boolean;
  method: 'http' | 'tcp';
  /** Last HTTP status seen, when any path answered. */
  status?: number;
  /** Scheme of the accepted HTTP answer. */
  scheme?: HttpScheme;
  detail?: string;
}

export interface ProbeTarget {
  host: string;
  port: number;
  check: HealthCheck;
  /** Budget for the whole probe: every path, every scheme and the TCP fallback. */
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HealthProbe {
  /** Never rejects: every failure is reported as an unhealthy result. */
  probe: (target: ProbeTarget) => Promise<ProbeResult>;
}

type HttpOutcome =
  | { kind: 'accepted'; status: number }
  | { kind: 'rejected'; status: number }
  | { kind: 'transport-error'; error: string };

export function tcpConnect(host: string, port: number, timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const socket = net.createConnection({ host, port });
    const onAbort = (): void => finish(false);
    const finish = (ok: boolean): void => {
      signal?.removeEventListener('abort', onAbort);
      socket.removeAllListeners();
      socket.destroy();
      resolve(ok);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
  });
}

export class LayeredHealthProbe implements HealthProbe {
  private readonly logger = getLoggerFor(this);

  public async probe(target: ProbeTarget): Promise<ProbeResult> {
    const { check, signal } = target;
    const budgetEnd = Date.now() + target.timeoutMs;
    const remaining = (): number => (signal?.aborted ? 0 : budgetEnd - Date.now());

    if (check.kind === 'tcp') {
      return this.probeTcp(target, remaining());
    }

    const attempts = (check.schemes ?? [ 'http' ]).flatMap((scheme) => check.paths.map((path) => ({ scheme, path })));
    const outcomes: HttpOutcome[] = [];
    for (const { scheme, path } of attempts) {
      const left = remaining();
      if (left <= 0) {
        break;
      }
      const outcome = await this.get(target, check, scheme, path, left);
      if (outcome.kind === 'accepted') {
        return { healthy: true, method: 'http', status: outcome.status, scheme };
      }
      outcomes.push(outcome);
    }

    const answered = outcomes.filter((o): o is Extract<HttpOutcome, { kind: 'rejected' }> => o.kind === 'rejected');
    if (answered.length > 0) {
      const last = answered[answered.length - 1];
      return { healthy: false, method: 'http', status: last.status, detail: `unexpected status ${last.status}` };
    }

    const lastError = outcomes.length > 0 ? outcomes[outcomes.length - 1] : undefined;
    const errorText = lastError?.kind === 'transport-error' ?
      lastError.error :
      attempts.length === 0 ? 'no health path configured' : 'no time left to probe';
    const left = remaining();
    if (check.tcpFallback === false || left <= 0) {
      return { healthy: false, method: 'http', detail: errorText };
    }

    this.logger.debug(`HTTP probe of ${target.host}:${target.port} failed (${errorText}), trying TCP`);
    return this.probeTcp(target, left);
  }

  private async probeTcp(target: ProbeTarget, timeoutMs: number): Promise<ProbeResult> {
    const ok = timeoutMs > 0 && await tcpConnect(target.host, target.port, timeoutMs, target.signal);
    return ok ?
      { healthy: true, method: 'tcp' } :
      { healthy: false, method: 'tcp', detail: 'connection failed' };
  }

  private async get(
    target: ProbeTarget,
    check: HttpHealthCheck,
    scheme: HttpScheme,
    path: string,
    timeoutMs: number,
  ): Promise<HttpOutcome> {
    const url = `${scheme}://${target.host}:${target.port}${path.startsWith('/') ? path : `/${path}`}`;
    const timeout = AbortSignal.timeout(timeoutMs);
    try {
      const res = await fetch(url, { signal: target.signal ? AbortSignal.any([ timeout, target.signal ]) : timeout });
      // Drain the body so the socket is released
      await res.arrayBuffer().catch(() => undefined);
      return check.acceptedStatus.includes(res.status) ?
        { kind: 'accepted', status: res.status } :
        { kind: 'rejected', status: res.status };
    } catch (error: unknown) {
      return { kind: 'transport-error', error: error instanceof Error ? error.message : String(error) };
    }
  }
}
