import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import fs from 'node:fs';
import path from 'node:path';
import kill from 'tree-kill';
import { getLoggerFor } from 'global-logger-factory';
import type { ProcessHandle } from './types';

export interface LaunchRequest {
  name: string;
  executable: string;
  args: string[];
  /** Applied on top of the parent environment for the child only. */
  env: Record<string, string>;
  cwd: string;
}

export interface ProcessLauncher {
  launch: (request: LaunchRequest) => Promise<ProcessHandle>;
  /** Stops a process this run started, with its descendants. */
  terminate: (handle: ProcessHandle) => Promise<void>;
}

/**
 * Keeps listening on a started child for the rest of its life. A ChildProcess
 * `'error'` without a listener would throw in the orchestrator.
 */
export function watchChild(child: EventEmitter, label: string, log: (message: string) => void): void {
  child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
    log(`${label} exited with code ${code ?? 'null'} signal ${signal ?? 'null'}`);
  });
  child.on('error', (error: Error) => {
    log(`${label} reported an error: ${error.message}`);
  });
}

/**
 * Starts services detached from the orchestrator so they keep running after it exits.
 * Output of each service is appended to `<logDir>/<name>.log`.
 */
export class DetachedProcessLauncher implements ProcessLauncher {
  private readonly logger = getLoggerFor(this);

  public constructor(private readonly logDir?: string) {}

  public async launch(request: LaunchRequest): Promise<ProcessHandle> {
    const logFile = this.logDir ? path.join(this.logDir, `${request.name}.log`) : undefined;
    let fd: number | undefined;
    if (logFile) {
      fs.mkdirSync(path.dirname(logFile), { recursive: true });
      fd = fs.openSync(logFile, 'a');
    }

    try {
      const child = spawn(request.executable, request.args, {
        cwd: request.cwd,
        env: { ...process.env, ...request.env },
        stdio: fd === undefined ? 'ignore' : [ 'ignore', fd, fd ],
        detached: true,
        windowsHide: true,
      });

      const pid = await new Promise<number>((resolve, reject) => {
        child.once('error', reject);
        child.once('spawn', () => {
          child.off('error', reject);
          if (child.pid === undefined) {
            reject(new Error(`No pid assigned to ${request.name}`));
            return;
          }
          resolve(child.pid);
        });
      });

      watchChild(child, `${request.name} (pid ${pid})`, (message) => this.logger.debug(message));
      child.unref();

      this.logger.info(`Started ${request.name} (pid ${pid}): ${request.executable} ${request.args.join(' ')}`);
      return { pid, command: request.executable, args: [ ...request.args ], logFile };
    } finally {
      if (fd !== undefined) {
        // The child holds its own copy of the descriptor
        fs.closeSync(fd);
      }
    }
  }

  public terminate(handle: ProcessHandle): Promise<void> {
    return new Promise((resolve, reject) => {
      kill(handle.pid, 'SIGTERM', (err) => {
        if (err) {
          reject(err);
          return;
        }
        this.logger.info(`Terminated pid ${handle.pid} (${handle.command})`);
        resolve();
      });
    });
  }
}
