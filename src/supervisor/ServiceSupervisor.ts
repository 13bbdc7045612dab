import { getLoggerFor } from 'global-logger-factory';
import { logContext } from '../logging/LogContext';
import type { PortBoard } from '../orchestrator/PortBoard';
import { type Clock, systemClock } from '../util/Clock';
import { DependencyTimeoutError, errorMessage, isAbortError } from '../util/errors';
import type { ExecutableResolver } from './ExecutableResolver';
import type { HealthProbe, ProbeResult } from './HealthProbe';
import { matchesOwner, type PortRegistry } from './PortRegistry';
import type { ProcessLauncher } from './ProcessLauncher';
import type {
  LaunchContext,
  ProcessHandle,
  ServiceSpec,
  ServiceState,
  ServiceStatus,
  StatusChangeHandler,
  TerminalStatus,
} from './types';

export interface SupervisorDeps {
  ports: PortRegistry;
  resolver: ExecutableResolver;
  launcher: ProcessLauncher;
  probe: HealthProbe;
  board: PortBoard;
  workDir: string;
  clock?: Clock;
  /** Only look for running instances; never launch. */
  detectOnly?: boolean;
  onStatusChange?: StatusChangeHandler;
}

type DependencyOutcome =
  | { ok: true; upstream: Map<string, number> }
  | { ok: false; reason: string };

/**
 * Drives one managed service from `not-started` to a terminal status:
 * adopt a running instance, or resolve the executable and launch it on the
 * first free port of its range, advancing through the range until a launch
 * becomes healthy within the service's wait window.
 */
export class ServiceSupervisor {
  private readonly logger = getLoggerFor(this);
  private readonly clock: Clock;
  private readonly state: ServiceState;

  public constructor(
    private readonly spec: ServiceSpec,
    private readonly deps: SupervisorDeps,
  ) {
    this.clock = deps.clock ?? systemClock;
    this.state = {
      name: spec.name,
      status: 'not-started',
      history: [ 'not-started' ],
      attemptedPorts: [],
      ownedByUs: false,
      softSuccess: false,
    };
  }

  public get name(): string {
    return this.spec.name;
  }

  public getState(): ServiceState {
    return {
      ...this.state,
      history: [ ...this.state.history ],
      attemptedPorts: [ ...this.state.attemptedPorts ],
      handle: this.state.handle ? { ...this.state.handle, args: [ ...this.state.handle.args ] } : undefined,
    };
  }

  /**
   * Resolves with the final state once a terminal status is reached.
   * Only an unexpected programming error rejects; aborts end in `aborted`.
   */
  public async run(signal?: AbortSignal): Promise<ServiceState> {
    return logContext.run({ service: this.spec.name }, async () => {
      try {
        await this.drive(signal);
      } catch (error: unknown) {
        if (!isAbortError(error, signal)) {
          this.deps.board.settle(this.spec.name, undefined);
          throw error;
        }
        this.logger.warn('Aborted; processes already started are left running');
        this.finish('aborted', 'run aborted');
      }
      this.deps.board.settle(
        this.spec.name,
        this.state.status === 'healthy' ? this.state.currentPort : undefined,
      );
      return this.getState();
    });
  }

  private async drive(signal?: AbortSignal): Promise<void> {
    this.transition('discovering');
    const adopted = await this.discover(signal);
    if (adopted !== undefined) {
      this.state.currentPort = adopted;
      this.state.ownedByUs = false;
      this.transition('bound');
      this.logger.info(`Found running instance on port ${adopted}`);

      if (await this.probeUntilHealthy(adopted, signal)) {
        this.finish('healthy');
        return;
      }
      if (this.spec.softSuccess && matchesOwner(await this.deps.ports.ownerOf(adopted), this.spec.expectedOwnerNames)) {
        this.state.softSuccess = true;
        this.logger.warn(`Port ${adopted} held by expected process but health endpoint never confirmed; accepting it`);
        this.finish('healthy', 'health not confirmed; adopted by process name');
        return;
      }
      this.logger.warn(`Running instance on port ${adopted} is not healthy; looking for another port`);
    }

    if (this.deps.detectOnly) {
      this.finish('not-running', 'no healthy running instance found');
      return;
    }

    const executable = await this.resolveExecutable();
    if (!executable) {
      this.finish('executable-not-found', `none of: ${this.spec.executableCandidates.join(', ')}`);
      return;
    }
    this.state.executable = executable;

    const dependencies = await this.awaitDependencies(signal);
    if (!dependencies.ok) {
      this.finish('dependency-unavailable', dependencies.reason);
      return;
    }

    const ctx: LaunchContext = {
      workDir: this.deps.workDir,
      executable,
      upstream: dependencies.upstream,
    };

    for (;;) {
      signal?.throwIfAborted();
      this.transition('launching');
      const port = await this.nextFreePort();
      if (port === undefined) {
        this.finish('exhausted-port-range', `tried ${this.state.attemptedPorts.join(', ') || 'no ports'}`);
        return;
      }
      this.state.attemptedPorts.push(port);
      this.state.currentPort = port;
      this.state.handle = undefined;

      const handle = await this.launchOn(port, ctx, signal);
      if (!handle) {
        continue;
      }
      this.state.handle = handle;
      this.state.ownedByUs = true;

      this.transition('settling');
      await this.clock.sleep(this.spec.settleDelayMs, signal);

      this.transition('probing');
      if (await this.probeUntilHealthy(port, signal)) {
        this.finish('healthy');
        return;
      }

      this.logger.warn(`Not healthy on port ${port} within ${this.spec.maxWaitMs}ms; trying the next port`);
      await this.terminateQuietly(handle);
    }
  }

  /** First port in range held by an expected owner. */
  private async discover(signal?: AbortSignal): Promise<number | undefined> {
    for (const port of this.spec.portRange) {
      signal?.throwIfAborted();
      if (!await this.isBound(port)) {
        continue;
      }
      const owner = await this.deps.ports.ownerOf(port);
      if (matchesOwner(owner, this.spec.expectedOwnerNames)) {
        return port;
      }
      this.logger.debug(`Port ${port} held by ${owner ? `${owner.name} (pid ${owner.pid})` : 'an unknown process'}`);
    }
    return undefined;
  }

  private async resolveExecutable(): Promise<string | undefined> {
    try {
      return await this.deps.resolver.resolve(this.spec.executableCandidates);
    } catch (error: unknown) {
      this.logger.warn(`Executable lookup failed: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async awaitDependencies(signal?: AbortSignal): Promise<DependencyOutcome> {
    const upstream = new Map<string, number>();
    for (const dependency of this.spec.dependsOn) {
      let port: number | undefined;
      try {
        this.logger.debug(`Waiting for ${dependency.service}`);
        port = await this.deps.board.waitFor(dependency.service, {
          timeoutMs: this.spec.dependencyTimeoutMs,
          signal,
        });
      } catch (error: unknown) {
        if (!(error instanceof DependencyTimeoutError)) {
          throw error;
        }
        if (dependency.optional) {
          this.logger.warn(error.message);
          continue;
        }
        return { ok: false, reason: error.message };
      }

      if (port !== undefined) {
        upstream.set(dependency.service, port);
      } else if (dependency.optional) {
        this.logger.info(`Optional upstream ${dependency.service} is not healthy; continuing without it`);
      } else {
        return { ok: false, reason: `${dependency.service} did not become healthy` };
      }
    }
    return { ok: true, upstream };
  }

  private async nextFreePort(): Promise<number | undefined> {
    for (const port of this.spec.portRange) {
      if (this.state.attemptedPorts.includes(port)) {
        continue;
      }
      if (await this.isBound(port)) {
        this.logger.debug(`Port ${port} is in use`);
        continue;
      }
      return port;
    }
    return undefined;
  }

  private async isBound(port: number): Promise<boolean> {
    try {
      return await this.deps.ports.isBound(port);
    } catch (error: unknown) {
      this.logger.debug(`Could not inspect port ${port}, treating it as taken: ${errorMessage(error)}`);
      return true;
    }
  }

  private async launchOn(port: number, ctx: LaunchContext, signal?: AbortSignal): Promise<ProcessHandle | undefined> {
    try {
      const args = this.spec.buildArgs(port, ctx);
      const env = this.spec.envOverlay(port, ctx);
      if (this.spec.prepare) {
        await this.spec.prepare(port, ctx);
      }
      signal?.throwIfAborted();
      return await this.deps.launcher.launch({
        name: this.spec.name,
        executable: ctx.executable,
        args,
        env,
        cwd: this.deps.workDir,
      });
    } catch (error: unknown) {
      if (isAbortError(error, signal)) {
        throw error;
      }
      this.logger.error(`Launch on port ${port} failed: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /**
   * Probes until healthy or until `maxWaitMs` has passed. Each probe only
   * gets the time left in the window, so the window is a hard ceiling.
   */
  private async probeUntilHealthy(port: number, signal?: AbortSignal): Promise<boolean> {
    const deadline = this.clock.now() + this.spec.maxWaitMs;
    for (;;) {
      signal?.throwIfAborted();
      const budget = Math.min(this.spec.requestTimeoutMs, deadline - this.clock.now());
      if (budget <= 0) {
        return false;
      }
      const result = await this.probeOnce(port, budget, signal);
      signal?.throwIfAborted();
      if (result.healthy) {
        this.state.scheme = result.scheme;
        this.logger.info(`Healthy on port ${port} (${result.method}${result.status ? ` ${result.status}` : ''})`);
        return true;
      }
      this.logger.debug(`Probe on port ${port} failed: ${result.detail ?? 'unhealthy'}`);
      const now = this.clock.now();
      if (now >= deadline || now + this.spec.probeIntervalMs > deadline) {
        return false;
      }
      await this.clock.sleep(this.spec.probeIntervalMs, signal);
    }
  }

  private async probeOnce(port: number, timeoutMs: number, signal?: AbortSignal): Promise<ProbeResult> {
    try {
      return await this.deps.probe.probe({
        host: this.spec.host,
        port,
        check: this.spec.healthCheck,
        timeoutMs,
        signal,
      });
    } catch (error: unknown) {
      return { healthy: false, method: this.spec.healthCheck.kind, detail: errorMessage(error) };
    }
  }

  private async terminateQuietly(handle: ProcessHandle): Promise<void> {
    try {
      await this.deps.launcher.terminate(handle);
    } catch (error: unknown) {
      this.logger.warn(`Could not stop pid ${handle.pid}: ${errorMessage(error)}`);
    }
  }

  private finish(status: TerminalStatus, detail?: string): void {
    this.state.detail = detail;
    this.transition(status);
    if (status === 'healthy') {
      this.logger.info(`${this.spec.name} is up on port ${this.state.currentPort ?? '?'}`);
    } else {
      this.logger.warn(`${this.spec.name} ended as ${status}${detail ? `: ${detail}` : ''}`);
    }
  }

  private transition(status: ServiceStatus): void {
    this.state.status = status;
    this.state.history.push(status);
    this.deps.onStatusChange?.(this.spec.name, this.getState());
  }
}
