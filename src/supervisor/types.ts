export type ServiceStatus =
  | 'not-started'
  | 'discovering'
  | 'bound'
  | 'launching'
  | 'settling'
  | 'probing'
  | 'healthy'
  | 'exhausted-port-range'
  | 'executable-not-found'
  | 'dependency-unavailable'
  | 'not-running'
  | 'aborted';

export type TerminalStatus = Extract<ServiceStatus,
  'healthy' | 'exhausted-port-range' | 'executable-not-found' | 'dependency-unavailable' | 'not-running' | 'aborted'>;

export const TERMINAL_STATUSES: readonly TerminalStatus[] = [
  'healthy',
  'exhausted-port-range',
  'executable-not-found',
  'dependency-unavailable',
  'not-running',
  'aborted',
];

export function isTerminalStatus(status: ServiceStatus): status is TerminalStatus {
  return TERMINAL_STATUSES.some((terminal) => terminal === status);
}

export interface TcpHealthCheck {
  kind: 'tcp';
}

export type HttpScheme = 'http' | 'https';

export interface HttpHealthCheck {
  kind: 'http';
  /** Tried in order; the first path answering with an accepted status wins. */
  paths: string[];
  acceptedStatus: number[];
  /** Every path is tried under each scheme in turn. Defaults to plain http. */
  schemes?: HttpScheme[];
  /** Fall back to a TCP connect when every path fails at transport level. Defaults to true. */
  tcpFallback?: boolean;
}

export type HealthCheck = TcpHealthCheck | HttpHealthCheck;

export interface ServiceDependency {
  service: string;
  /** Optional dependencies are awaited but an unhealthy upstream does not block the launch. */
  optional?: boolean;
}

export interface LaunchContext {
  workDir: string;
  executable: string;
  /** Resolved ports of healthy upstream services, keyed by service name. */
  upstream: ReadonlyMap<string, number>;
}

export interface ServiceSpec {
  name: string;
  executableCandidates: string[];
  portRange: number[];
  expectedOwnerNames: string[];
  buildArgs: (port: number, ctx: LaunchContext) => string[];
  envOverlay: (port: number, ctx: LaunchContext) => Record<string, string>;
  /** Runs after upstream ports are known and before the process starts. */
  prepare?: (port: number, ctx: LaunchContext) => Promise<void>;
  healthCheck: HealthCheck;
  host: string;
  settleDelayMs: number;
  probeIntervalMs: number;
  maxWaitMs: number;
  requestTimeoutMs: number;
  required: boolean;
  softSuccess: boolean;
  dependsOn: ServiceDependency[];
  dependencyTimeoutMs: number;
}

export interface ProcessHandle {
  pid: number;
  command: string;
  args: string[];
  logFile?: string;
}

export interface ProcessIdentity {
  pid: number;
  name: string;
}

export interface ServiceState {
  name: string;
  status: ServiceStatus;
  history: ServiceStatus[];
  attemptedPorts: number[];
  currentPort?: number;
  /** Scheme the health endpoint answered on, when it answered over HTTP. */
  scheme?: HttpScheme;
  handle?: ProcessHandle;
  executable?: string;
  ownedByUs: boolean;
  softSuccess: boolean;
  detail?: string;
}

export type StatusChangeHandler = (name: string, state: ServiceState) => void;
