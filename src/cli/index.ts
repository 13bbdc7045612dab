#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { getVersion } from '../runtime';
import { checkCommand } from './commands/check';
import { statusCommand } from './commands/status';
import { stopCommand } from './commands/stop';
import { upCommand } from './commands/up';

yargs(hideBin(process.argv))
  .scriptName('stackup')
  .usage('$0 <command> [options]')
  .version(getVersion())
  .command(upCommand)
  .command(checkCommand)
  .command(statusCommand)
  .command(stopCommand)
  .strict()
  .help()
  .parse();
