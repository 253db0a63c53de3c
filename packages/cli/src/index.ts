#!/usr/bin/env tsx
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { supportedVersions } from '@netdump/core';

import { initCommand } from './commands/init.ts';
import { gameCommand } from './commands/game.ts';
import { bcaCommand } from './commands/bca.ts';
import { infoCommand } from './commands/info.ts';
import { fullCommand } from './commands/full.ts';
import { ejectCommand, exitCommand, shutdownCommand, disconnectCommand } from './commands/control.ts';

await yargs(hideBin(process.argv))
  .scriptName('netdump')
  .usage('$0 <command> [options]')
  .option('address', {
    alias: 'a',
    describe: 'Hostname of the console running the dump server',
    type: 'string',
  })
  .option('port', {
    alias: 'p',
    describe: 'Server port (default: 9875)',
    type: 'number',
  })
  .option('protocol-version', {
    describe: 'NETDUMP protocol version spoken by the server (default: 1)',
    type: 'number',
    choices: supportedVersions(),
  })
  .option('timeout', {
    describe: 'Give up after this many ms without data (default: wait forever)',
    type: 'number',
  })
  .option('project', {
    describe: 'Directory holding netdump.json',
    type: 'string',
    default: process.cwd(),
  })
  .command(initCommand)
  .command(gameCommand)
  .command(bcaCommand)
  .command(infoCommand)
  .command(ejectCommand)
  .command(exitCommand)
  .command(shutdownCommand)
  .command(disconnectCommand)
  .command(fullCommand)
  .demandCommand(1, 'You need at least one command')
  .strict()
  .help()
  .parse();
