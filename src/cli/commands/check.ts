import type { CommandModule } from 'yargs';
import { EXIT_INTERNAL_ERROR } from '../../orchestrator/Orchestrator';
import { errorMessage } from '../../util/errors';
import { runStack } from '../lib/stack';
import { type StackArgs, toLoadOptions, withStackOptions } from '../options';

export const checkCommand: CommandModule<object, StackArgs> = {
  command: 'check',
  describe: 'Look for running services without launching anything',
  builder: (yargs) => withStackOptions(yargs),
  handler: async (argv) => {
    try {
      process.exitCode = await runStack(toLoadOptions(argv), { detectOnly: true, json: argv.json });
    } catch (error: unknown) {
      console.error(`Unexpected error: ${errorMessage(error)}`);
      process.exitCode = EXIT_INTERNAL_ERROR;
    }
  },
};
