import { getLoggerFor } from 'global-logger-factory';
import { type ExecutableResolver, FileSystemExecutableResolver } from '../supervisor/ExecutableResolver';
import { type HealthProbe, LayeredHealthProbe } from '../supervisor/HealthProbe';
import { type PortRegistry, SystemPortRegistry } from '../supervisor/PortRegistry';
import { DetachedProcessLauncher, type ProcessLauncher } from '../supervisor/ProcessLauncher';
import { ServiceSupervisor } from '../supervisor/ServiceSupervisor';
import type { ServiceSpec, ServiceState, StatusChangeHandler, TerminalStatus } from '../supervisor/types';
import { isTerminalStatus } from '../supervisor/types';
import type { Clock } from '../util/Clock';
import { StackConfigError } from '../util/errors';
import { PortBoard } from './PortBoard';

export const EXIT_OK = 0;
export const EXIT_STACK_UNHEALTHY = 3;
export const EXIT_CONFIG_ERROR = 20;
export const EXIT_INTERNAL_ERROR = 50;

export interface ServiceReport {
  status: TerminalStatus;
  required: boolean;
  port?: number;
  url?: string;
  ownedByUs: boolean;
  pid?: number;
  softSuccess: boolean;
  attemptedPorts: number[];
  executable?: string;
  logFile?: string;
  detail?: string;
}

export interface StackReport {
  startTime: string;
  services: Record<string, ServiceReport>;
  /** Every required service is healthy. */
  ok: boolean;
  exitCode: number;
}

export interface OrchestratorOptions {
  /** Enabled services in declaration order; a service consuming another's port comes after it. */
  services: ServiceSpec[];
  /** Names of declared but disabled services; dependents see them as unhealthy. */
  disabled?: string[];
  workDir: string;
  logDir?: string;
  concurrent?: boolean;
  detectOnly?: boolean;
  ports?: PortRegistry;
  resolver?: ExecutableResolver;
  launcher?: ProcessLauncher;
  probe?: HealthProbe;
  clock?: Clock;
  onStatusChange?: StatusChangeHandler;
}

export class Orchestrator {
  private readonly logger = getLoggerFor(this);
  private readonly ports: PortRegistry;
  private readonly resolver: ExecutableResolver;
  private readonly launcher: ProcessLauncher;
  private readonly probe: HealthProbe;

  public constructor(private readonly options: OrchestratorOptions) {
    this.ports = options.ports ?? new SystemPortRegistry();
    this.resolver = options.resolver ?? new FileSystemExecutableResolver();
    this.launcher = options.launcher ?? new DetachedProcessLauncher(options.logDir);
    this.probe = options.probe ?? new LayeredHealthProbe();
    this.validate();
  }

  public async run(signal?: AbortSignal): Promise<StackReport> {
    const startTime = new Date().toISOString();
    const board = new PortBoard();
    for (const name of this.options.disabled ?? []) {
      board.settle(name, undefined);
    }

    const supervisors = this.options.services.map((spec) => new ServiceSupervisor(spec, {
      ports: this.ports,
      resolver: this.resolver,
      launcher: this.launcher,
      probe: this.probe,
      board,
      workDir: this.options.workDir,
      clock: this.options.clock,
      detectOnly: this.options.detectOnly,
      onStatusChange: this.options.onStatusChange,
    }));

    this.logger.info(`Bringing up ${supervisors.map((s) => s.name).join(', ') || 'no services'}` +
      `${this.options.concurrent ? ' concurrently' : ''}${this.options.detectOnly ? ' (detect only)' : ''}`);

    let states: ServiceState[];
    if (this.options.concurrent) {
      states = await Promise.all(supervisors.map(async (supervisor) => supervisor.run(signal)));
    } else {
      states = [];
      for (const supervisor of supervisors) {
        states.push(await supervisor.run(signal));
      }
    }

    return this.buildReport(startTime, states);
  }

  private buildReport(startTime: string, states: ServiceState[]): StackReport {
    const services: Record<string, ServiceReport> = {};
    let ok = true;
    for (const [ index, state ] of states.entries()) {
      const spec = this.options.services[index];
      if (!isTerminalStatus(state.status)) {
        throw new Error(`${state.name} stopped in non-terminal status ${state.status}`);
      }
      const healthy = state.status === 'healthy';
      if (spec.required && !healthy) {
        ok = false;
      }
      const configured = spec.healthCheck.kind === 'http' ? spec.healthCheck.schemes?.[0] : undefined;
      const scheme = state.scheme ?? configured ?? 'http';
      services[state.name] = {
        status: state.status,
        required: spec.required,
        port: healthy ? state.currentPort : undefined,
        url: healthy && state.currentPort !== undefined ? `${scheme}://${spec.host}:${state.currentPort}` : undefined,
        ownedByUs: state.ownedByUs && healthy,
        pid: healthy ? state.handle?.pid : undefined,
        softSuccess: state.softSuccess,
        attemptedPorts: state.attemptedPorts,
        executable: state.executable,
        logFile: state.handle?.logFile,
        detail: state.detail,
      };
    }
    return { startTime, services, ok, exitCode: ok ? EXIT_OK : EXIT_STACK_UNHEALTHY };
  }

  private validate(): void {
    const seen = new Set<string>();
    const disabled = new Set(this.options.disabled ?? []);
    const declared = new Set([ ...this.options.services.map((spec) => spec.name), ...disabled ]);

    for (const spec of this.options.services) {
      if (seen.has(spec.name)) {
        throw new StackConfigError(`Service ${spec.name} is declared twice`);
      }
      if (spec.portRange.length === 0) {
        throw new StackConfigError(`Service ${spec.name} has an empty port range`);
      }
      for (const dependency of spec.dependsOn) {
        if (!declared.has(dependency.service)) {
          throw new StackConfigError(`Service ${spec.name} depends on unknown service ${dependency.service}`);
        }
        if (!disabled.has(dependency.service) && !seen.has(dependency.service)) {
          throw new StackConfigError(`Service ${spec.name} must be declared after its dependency ${dependency.service}`);
        }
      }
      seen.add(spec.name);
    }
  }
}
