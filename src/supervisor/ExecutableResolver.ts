import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { glob, hasMagic } from 'glob';
import { getLoggerFor } from 'global-logger-factory';

export interface ExecutableResolver {
  /** First existing executable among the candidates, in order, or undefined. */
  resolve: (candidates: readonly string[]) => Promise<string | undefined>;
}

const collator = new Intl.Collator(undefined, { numeric: true, sensitivity: 'base' });

/**
 * Orders glob matches so the highest version directory comes first,
 * e.g. `prometheus-2.53.0` before `prometheus-2.9.1`.
 */
export function sortNewestFirst(paths: readonly string[]): string[] {
  return [ ...paths ].sort((left, right) => collator.compare(right, left));
}

export function expandHome(candidate: string, home = os.homedir()): string {
  if (candidate === '~') {
    return home;
  }
  if (candidate.startsWith('~/')) {
    return path.join(home, candidate.slice(2));
  }
  return candidate;
}

function isBareCommand(candidate: string): boolean {
  return !candidate.includes('/') && !candidate.includes('\\');
}

export class FileSystemExecutableResolver implements ExecutableResolver {
  private readonly logger = getLoggerFor(this);

  public constructor(private readonly searchPath: string = process.env.PATH ?? '') {}

  public async resolve(candidates: readonly string[]): Promise<string | undefined> {
    for (const candidate of candidates) {
      if (!candidate.trim()) {
        continue;
      }
      for (const option of await this.expand(candidate.trim())) {
        if (await this.isExecutable(option)) {
          this.logger.debug(`Resolved ${candidate} to ${option}`);
          return option;
        }
      }
    }
    return undefined;
  }

  private async expand(candidate: string): Promise<string[]> {
    if (isBareCommand(candidate)) {
      return this.searchPath
        .split(path.delimiter)
        .filter((dir) => dir.length > 0)
        .map((dir) => path.join(dir, candidate));
    }

    const expanded = path.resolve(expandHome(candidate));
    if (!hasMagic(expanded, { windowsPathsNoEscape: true })) {
      return [ expanded ];
    }

    const matches = await glob(expanded, { absolute: true, nodir: true, windowsPathsNoEscape: true });
    return sortNewestFirst(matches);
  }

  private async isExecutable(filePath: string): Promise<boolean> {
    try {
      const info = await stat(filePath);
      if (!info.isFile()) {
        return false;
      }
      await access(filePath, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }
}
