import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';

export interface PrometheusConfigOptions {
  file: string;
  host: string;
  port: number;
  /** Regenerate even when the file exists; used for the file stackup owns. */
  overwrite: boolean;
}

export function renderPrometheusConfig(host: string, port: number): string {
  return yaml.dump({
    global: {
      scrape_interval: '15s',
      evaluation_interval: '15s',
    },
    scrape_configs: [
      {
        job_name: 'prometheus',
        static_configs: [{ targets: [ `${host}:${port}` ]}],
      },
    ],
  });
}

/**
 * Makes sure the metrics server has a config file to start with.
 * Returns true when a file was written.
 */
export async function ensurePrometheusConfig(options: PrometheusConfigOptions): Promise<boolean> {
  if (!options.overwrite) {
    const exists = await fs.access(options.file).then(() => true, () => false);
    if (exists) {
      return false;
    }
  }
  await fs.mkdir(path.dirname(options.file), { recursive: true });
  await fs.writeFile(options.file, renderPrometheusConfig(options.host, options.port), 'utf-8');
  return true;
}
