import { createLogger, format, transports } from 'winston';
import type { Format, TransformableInfo } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type * as Transport from 'winston-transport';
import type { Logger, LoggerFactory } from 'global-logger-factory';
import { WinstonLogger } from 'global-logger-factory';
import { logContext } from './LogContext';

export interface ConfigurableLoggerOptions {
  /** Rotating log file pattern; no file transport when omitted. */
  fileName?: string;
  maxSize?: string;
  maxFiles?: string;
  showLocation?: boolean;
  /** Disable ANSI colors on the console transport. */
  plain?: boolean;
}

export class ConfigurableLoggerFactory implements LoggerFactory {
  private readonly level: string;
  private readonly showLocation: boolean;
  private readonly plain: boolean;
  private readonly fileTransport?: DailyRotateFile;

  public constructor(level: string, options: ConfigurableLoggerOptions = {}) {
    this.level = level;
    this.showLocation = options.showLocation ?? false;
    this.plain = options.plain ?? false;
    if (options.fileName) {
      this.fileTransport = new DailyRotateFile({
        filename: options.fileName,
        datePattern: 'YYYY-MM-DD',
        maxSize: options.maxSize ?? '10m',
        maxFiles: options.maxFiles ?? '14d',
      });
      // Shared by every logger the factory creates
      this.fileTransport.setMaxListeners(Infinity);
    }
  }

  public createLogger(label: string): Logger {
    return new WinstonLogger(createLogger({
      level: this.level,
      format: this.getFormat(label),
      transports: this.createTransports(label),
    }));
  }

  protected createTransports(label: string): Transport[] {
    const consoleTransport = new transports.Console({
      format: this.plain ? this.getFormat(label) : format.combine(format.colorize(), this.getFormat(label)),
    });
    return this.fileTransport ? [ consoleTransport, this.fileTransport ] : [ consoleTransport ];
  }

  protected getFormat(label: string): Format {
    return format.combine(
      format.label({ label }),
      format.timestamp(),
      format((info) => {
        const store = logContext.getStore();
        if (store?.service) {
          info.service = store.service;
        }
        return info;
      })(),
      format.printf(
        ({ level: levelInner, message, label: labelInner, timestamp, service }: TransformableInfo): string => {
          const serviceInfo = typeof service === 'string' ? ` [svc:${service}]` : '';
          let displayLabel = String(labelInner ?? '');
          if (this.showLocation && displayLabel) {
            const className = displayLabel.split('/').pop();
            if (className && className !== 'Object') {
              displayLabel = className;
            }
          }
          return `${String(timestamp)}${serviceInfo} [${displayLabel}] ${levelInner}: ${String(message)}`;
        },
      ),
    );
  }
}
