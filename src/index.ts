export * from './config/StackConfig';
export * from './orchestrator/Orchestrator';
export { PortBoard } from './orchestrator/PortBoard';
export { formatSummary, hintFor } from './orchestrator/Summary';
export * from './runtime/RuntimeRecord';
export * from './stack';
export { ConfigurableLoggerFactory, type ConfigurableLoggerOptions } from './logging/ConfigurableLoggerFactory';
export * from './supervisor/ExecutableResolver';
export * from './supervisor/HealthProbe';
export * from './supervisor/PortRegistry';
export * from './supervisor/ProcessLauncher';
export { ServiceSupervisor, type SupervisorDeps } from './supervisor/ServiceSupervisor';
export * from './supervisor/types';
export { type Clock, systemClock } from './util/Clock';
export * from './util/errors';
