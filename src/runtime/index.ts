import path from 'path';
import fs from 'fs';

/** Package root: walk up from __dirname until we find package.json */
function findPackageRoot(dir: string): string {
  let current = dir;
  while (current !== path.dirname(current)) {
    if (fs.existsSync(path.join(current, 'package.json'))) {
      return current;
    }
    current = path.dirname(current);
  }
  return dir;
}

export const PACKAGE_ROOT = findPackageRoot(__dirname);

export function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(PACKAGE_ROOT, 'package.json'), 'utf-8'));
    return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string' ?
      pkg.version :
      'unknown';
  } catch {
    return 'unknown';
  }
}

export {
  deleteRuntimeRecord,
  getRuntimeFilePath,
  isProcessRunning,
  loadRuntimeRecord,
  saveRuntimeRecord,
  toRuntimeRecord,
} from './RuntimeRecord';
export type { RuntimeRecord } from './RuntimeRecord';
