import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import { serviceUrl } from './common';

export interface ProvisioningInput {
  provisioningDir: string;
  /** Staged directory of dashboard JSON documents served by the file provider. */
  dashboardsDir: string;
  host: string;
  prometheusPort: number;
  influxPort?: number;
}

export interface ProvisioningFiles {
  datasources: string;
  dashboards: string;
}

interface DatasourceEntry {
  name: string;
  type: string;
  access: 'proxy';
  url: string;
  isDefault: boolean;
  editable: boolean;
}

export function buildDatasources(input: ProvisioningInput): { apiVersion: number; datasources: DatasourceEntry[] } {
  const datasources: DatasourceEntry[] = [{
    name: 'Prometheus',
    type: 'prometheus',
    access: 'proxy',
    url: serviceUrl(input.host, input.prometheusPort),
    isDefault: true,
    editable: true,
  }];
  if (input.influxPort !== undefined) {
    datasources.push({
      name: 'InfluxDB',
      type: 'influxdb',
      access: 'proxy',
      url: serviceUrl(input.host, input.influxPort),
      isDefault: false,
      editable: true,
    });
  }
  return { apiVersion: 1, datasources };
}

export function buildDashboardProvider(dashboardsDir: string): Record<string, unknown> {
  return {
    apiVersion: 1,
    providers: [{
      name: 'stackup',
      folder: 'Stack',
      type: 'file',
      disableDeletion: false,
      allowUiUpdates: true,
      options: {
        path: dashboardsDir,
        foldersFromFilesStructure: true,
      },
    }],
  };
}

/**
 * Writes the datasource and dashboard-provider descriptors the dashboard UI server
 * reads from its provisioning directory at startup. Content is not validated here.
 */
export async function writeGrafanaProvisioning(input: ProvisioningInput): Promise<ProvisioningFiles> {
  const datasourcesDir = path.join(input.provisioningDir, 'datasources');
  const dashboardsProviderDir = path.join(input.provisioningDir, 'dashboards');
  await Promise.all([
    fs.mkdir(datasourcesDir, { recursive: true }),
    fs.mkdir(dashboardsProviderDir, { recursive: true }),
    fs.mkdir(input.dashboardsDir, { recursive: true }),
  ]);

  const files: ProvisioningFiles = {
    datasources: path.join(datasourcesDir, 'stackup.yaml'),
    dashboards: path.join(dashboardsProviderDir, 'stackup.yaml'),
  };
  await fs.writeFile(files.datasources, yaml.dump(buildDatasources(input)), 'utf-8');
  await fs.writeFile(files.dashboards, yaml.dump(buildDashboardProvider(input.dashboardsDir)), 'utf-8');
  return files;
}
