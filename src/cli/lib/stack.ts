import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';
import { loadStackConfig, type LoadOptions, type StackConfig } from '../../config/StackConfig';
import {
  EXIT_CONFIG_ERROR,
  Orchestrator,
  type OrchestratorOptions,
  type StackReport,
} from '../../orchestrator/Orchestrator';
import { formatSummary } from '../../orchestrator/Summary';
import { loadRuntimeRecord, saveRuntimeRecord, toRuntimeRecord } from '../../runtime/RuntimeRecord';
import { planStack } from '../../stack';
import { StackConfigError } from '../../util/errors';
import { initLogger } from './logger';
import { openBrowser } from './browser';

export interface RunStackOptions {
  detectOnly: boolean;
  json: boolean;
  /** Test seam: collaborators the orchestrator would otherwise create. */
  orchestrator?: Partial<Pick<OrchestratorOptions, 'ports' | 'resolver' | 'launcher' | 'probe' | 'clock'>>;
  open?: (url: string) => Promise<boolean>;
  print?: (text: string) => void;
}

export function loadConfigOrExit(load: LoadOptions): StackConfig | number {
  try {
    return loadStackConfig(load);
  } catch (error: unknown) {
    if (error instanceof StackConfigError) {
      console.error(`Configuration error: ${error.message}`);
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  }
}

export function reportToText(report: StackReport, json: boolean): string {
  return json ? JSON.stringify(report, null, 2) : formatSummary(report);
}

export function createOrchestrator(config: StackConfig, options: RunStackOptions): Orchestrator {
  const plan = planStack(config);
  return new Orchestrator({
    ...options.orchestrator,
    services: plan.services,
    disabled: plan.disabled,
    workDir: config.workDir,
    logDir: path.join(config.workDir, 'logs'),
    concurrent: config.concurrent,
    detectOnly: options.detectOnly,
  });
}

/**
 * Brings the stack up (or only inspects it) and returns the process exit code.
 * SIGINT/SIGTERM stop further probing; already started services keep running.
 */
export async function runStack(load: LoadOptions, options: RunStackOptions): Promise<number> {
  const config = loadConfigOrExit(load);
  if (typeof config === 'number') {
    return config;
  }
  initLogger(config.logLevel, config.workDir);
  const logger = getLoggerFor('Stack');
  const print = options.print ?? ((text: string): void => console.log(text));

  let orchestrator: Orchestrator;
  try {
    orchestrator = createOrchestrator(config, options);
  } catch (error: unknown) {
    if (error instanceof StackConfigError) {
      console.error(`Configuration error: ${error.message}`);
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  }

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn(`Received ${signal}; aborting, started services keep running`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const report = await orchestrator.run(controller.signal);
    if (!options.detectOnly) {
      saveRuntimeRecord(config.workDir, toRuntimeRecord(report, loadRuntimeRecord(config.workDir)));
    }
    print(reportToText(report, options.json));

    const grafana = report.services.grafana;
    if (config.openBrowser && grafana?.status === 'healthy' && grafana.url) {
      const opened = await (options.open ?? openBrowser)(grafana.url);
      if (!opened) {
        logger.warn(`Could not open a browser; visit ${grafana.url}`);
      }
    }
    return report.exitCode;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}
