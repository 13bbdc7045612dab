import { DependencyTimeoutError } from '../util/errors';

interface Slot {
  settled: boolean;
  port?: number;
  promise: Promise<number | undefined>;
  resolve: (port: number | undefined) => void;
}

export interface WaitOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Write-once handoff of resolved ports between services.
 * A service settles its slot exactly once: with its port when healthy,
 * with undefined when it ended in any other terminal state.
 */
export class PortBoard {
  private readonly slots = new Map<string, Slot>();

  public settle(service: string, port: number | undefined): void {
    const slot = this.slot(service);
    if (slot.settled) {
      throw new Error(`Port for ${service} was already published`);
    }
    slot.settled = true;
    slot.port = port;
    slot.resolve(port);
  }

  public isSettled(service: string): boolean {
    return this.slots.get(service)?.settled ?? false;
  }

  /** Port of a settled healthy service, without waiting. */
  public peek(service: string): number | undefined {
    return this.slots.get(service)?.port;
  }

  public waitFor(service: string, options: WaitOptions): Promise<number | undefined> {
    const slot = this.slot(service);
    if (slot.settled) {
      return Promise.resolve(slot.port);
    }

    const { timeoutMs, signal } = options;
    return new Promise((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const onAbort = (): void => {
        cleanup();
        reject(signal?.reason ?? new Error('Aborted'));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new DependencyTimeoutError(service, timeoutMs));
      }, timeoutMs);

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      slot.promise.then((port) => {
        cleanup();
        resolve(port);
      }, reject);
    });
  }

  private slot(service: string): Slot {
    let slot = this.slots.get(service);
    if (!slot) {
      let resolve: (port: number | undefined) => void = () => undefined;
      const promise = new Promise<number | undefined>((res) => {
        resolve = res;
      });
      slot = { settled: false, promise, resolve };
      this.slots.set(service, slot);
    }
    return slot;
  }
}
