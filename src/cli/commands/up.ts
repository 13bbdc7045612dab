import type { CommandModule } from 'yargs';
import { EXIT_INTERNAL_ERROR } from '../../orchestrator/Orchestrator';
import { errorMessage } from '../../util/errors';
import { runStack } from '../lib/stack';
import { type StackArgs, toLoadOptions, withStackOptions } from '../options';

interface UpArgs extends StackArgs {
  open?: boolean;
  concurrent?: boolean;
}

export const upCommand: CommandModule<object, UpArgs> = {
  command: [ 'up', '$0' ],
  describe: 'Discover, launch and health-check the observability stack',
  builder: (yargs) =>
    withStackOptions(yargs)
      .option('open', {
        type: 'boolean',
        description: 'Open the dashboard UI in a browser once it is healthy',
      })
      .option('concurrent', {
        type: 'boolean',
        description: 'Bring services up concurrently; dependents still wait for upstream ports',
      }),
  handler: async (argv) => {
    try {
      process.exitCode = await runStack(
        toLoadOptions(argv, { open: argv.open, concurrent: argv.concurrent }),
        { detectOnly: false, json: argv.json },
      );
    } catch (error: unknown) {
      console.error(`Unexpected error: ${errorMessage(error)}`);
      process.exitCode = EXIT_INTERNAL_ERROR;
    }
  },
};
