import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import portfinder from 'portfinder';
import { getLoggerFor } from 'global-logger-factory';
import type { ProcessIdentity } from './types';

const execFileAsync = promisify(execFile);

export interface PortRegistry {
  isBound: (port: number) => Promise<boolean>;
  /** Resolves to undefined when the owner cannot be determined; never rejects. */
  ownerOf: (port: number) => Promise<ProcessIdentity | undefined>;
}

function normalizeProcessName(name: string): string {
  const lower = name.trim().toLowerCase();
  return lower.endsWith('.exe') ? lower.slice(0, -4) : lower;
}

/**
 * Case-insensitive membership of the owner's process name in the expected set.
 * An unknown owner never matches.
 */
export function matchesOwner(identity: ProcessIdentity | undefined, expectedNames: readonly string[]): boolean {
  if (!identity) {
    return false;
  }
  const name = normalizeProcessName(identity.name);
  return expectedNames.some((expected) => normalizeProcessName(expected) === name);
}

/**
 * Parses `lsof -F pc` field output: `p<pid>` and `c<command>` lines.
 */
export function parseLsofOwner(output: string): ProcessIdentity | undefined {
  let pid: number | undefined;
  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith('p')) {
      const parsed = parseInt(trimmed.slice(1), 10);
      pid = Number.isFinite(parsed) ? parsed : undefined;
    } else if (trimmed.startsWith('c') && pid !== undefined) {
      const name = trimmed.slice(1);
      if (name) {
        return { pid, name };
      }
    }
  }
  return undefined;
}

/**
 * Inspects the local host: a bind probe decides whether a port is taken,
 * lsof tells who holds it.
 */
export class SystemPortRegistry implements PortRegistry {
  private readonly logger = getLoggerFor(this);

  public constructor(private readonly lsofTimeoutMs = 3000) {}

  public async isBound(port: number): Promise<boolean> {
    try {
      const free = await portfinder.getPortPromise({ port, stopPort: port });
      return free !== port;
    } catch {
      return true;
    }
  }

  public async ownerOf(port: number): Promise<ProcessIdentity | undefined> {
    try {
      const { stdout } = await execFileAsync(
        'lsof',
        [ '+c', '0', '-nP', `-iTCP:${port}`, '-sTCP:LISTEN', '-Fpc' ],
        { encoding: 'utf-8', timeout: this.lsofTimeoutMs },
      );
      return parseLsofOwner(stdout);
    } catch (error: unknown) {
      // lsof exits non-zero when nothing matches
      this.logger.debug(`Owner lookup for port ${port} failed: ${String(error)}`);
      return undefined;
    }
  }
}
