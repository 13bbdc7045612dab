import type { CommandModule } from 'yargs';
import { EXIT_INTERNAL_ERROR, EXIT_OK } from '../../orchestrator/Orchestrator';
import { deleteRuntimeRecord, loadRuntimeRecord } from '../../runtime/RuntimeRecord';
import { DetachedProcessLauncher } from '../../supervisor/ProcessLauncher';
import { errorMessage } from '../../util/errors';
import { EXIT_NOT_RUNNING, stopRecordedServices } from '../lib/inspect';
import { initLogger } from '../lib/logger';
import { loadConfigOrExit } from '../lib/stack';
import { type StackArgs, toLoadOptions, withStackOptions } from '../options';

export const stopCommand: CommandModule<object, StackArgs> = {
  command: 'stop',
  describe: 'Stop the services started by `stackup up`',
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
      if (!record) {
        console.log('Nothing to stop: no runtime record found.');
        process.exitCode = EXIT_NOT_RUNNING;
        return;
      }

      const outcome = await stopRecordedServices(
        record,
        new DetachedProcessLauncher(),
        undefined,
        (name, message) => console.error(`Could not stop ${name}: ${message}`),
      );
      for (const name of outcome.stopped) {
        console.log(`Stopped ${name}`);
      }
      if (outcome.stopped.length === 0) {
        console.log('No running services started by stackup.');
      }
      if (outcome.failed.length > 0) {
        process.exitCode = EXIT_INTERNAL_ERROR;
        return;
      }
      deleteRuntimeRecord(config.workDir);
      process.exitCode = EXIT_OK;
    } catch (error: unknown) {
      console.error(`Unexpected error: ${errorMessage(error)}`);
      process.exitCode = EXIT_INTERNAL_ERROR;
    }
  },
};
