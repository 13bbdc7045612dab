import { AsyncLocalStorage } from 'node:async_hooks';

export interface LogContext {
  /** Managed service whose supervisor emitted the line. */
  service: string;
}

export const logContext = new AsyncLocalStorage<LogContext>();
