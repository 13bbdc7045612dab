import path from 'node:path';
import { setGlobalLoggerFactory } from 'global-logger-factory';
import { ConfigurableLoggerFactory } from '../../logging/ConfigurableLoggerFactory';

export function initLogger(level: string, workDir: string): void {
  setGlobalLoggerFactory(new ConfigurableLoggerFactory(level, {
    fileName: path.join(workDir, 'logs', 'stackup-%DATE%.log'),
    showLocation: true,
    plain: !process.stdout.isTTY,
  }));
}
