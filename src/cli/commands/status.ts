import type { CommandModule } from 'yargs';
import { EXIT_CONFIG_ERROR, EXIT_INTERNAL_ERROR, EXIT_OK } from '../../orchestrator/Orchestrator';
import { getRuntimeFilePath, loadRuntimeRecord } from '../../runtime/RuntimeRecord';
import { planStack } from '../../stack';
import { LayeredHealthProbe } from '../../supervisor/HealthProbe';
import { errorMessage, StackConfigError } from '../../util/errors';
import { EXIT_NOT_RUNNING, formatStatus, inspectStack } from '../lib/inspect';
import { initLogger } from '../lib/logger';
import { loadConfigOrExit } from '../lib/stack';
import { type StackArgs, toLoadOptions, withStackOptions } from '../options';

export const statusCommand: CommandModule<object, StackArgs> = {
  command: 'status',
  describe: 'Re-check the services recorded by the last `up`',
  builder: (yargs) => withStackOptions(yargs),
  handler: async (argv) => {
    try {
      const config = loadConfigOrExit(toLoadOptions(argv));
      if (typeof config === 'number') {
        process.exitCode = config;
        return;
      }
      initLogger(config.logLevel, config.workDir);

      const record = loadRuntimeRecord(config.workDir);
      if (!record && !argv.json) {
        console.log(`No runtime record at ${getRuntimeFilePath(config.workDir)}. Has \`stackup up\` been run?`);
      }

      const entries = await inspectStack(planStack(config).services, record, new LayeredHealthProbe());
      console.log(argv.json ? JSON.stringify(entries, null, 2) : formatStatus(entries));

      const up = entries.every((entry) => entry.healthy || !entry.required);
      process.exitCode = up ? EXIT_OK : EXIT_NOT_RUNNING;
    } catch (error: unknown) {
      if (error instanceof StackConfigError) {
        console.error(`Configuration error: ${error.message}`);
        process.exitCode = EXIT_CONFIG_ERROR;
        return;
      }
      console.error(`Unexpected error: ${errorMessage(error)}`);
      process.exitCode = EXIT_INTERNAL_ERROR;
    }
  },
};
