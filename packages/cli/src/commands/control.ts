import type { CommandModule } from 'yargs';
import type { Operation } from '@netdump/core';
import { runOperation } from '../run-operation.ts';

function controlCommand(
  command: string,
  describe: string,
  operation: Operation,
  done: string,
): CommandModule {
  return {
    command,
    describe,
    handler: async (argv) => {
      const outcome = await runOperation(argv, operation);
      if (outcome?.kind === 'ok') console.error(done);
    },
  };
}

export const ejectCommand = controlCommand('eject', 'Eject the disc from the drive', 'eject', 'Disc ejected');
export const exitCommand = controlCommand('exit', 'Exit the dump program on the console', 'exit', 'Remote program exited');
export const shutdownCommand = controlCommand('shutdown', 'Shut the console down', 'shutdown', 'Console shutting down');
export const disconnectCommand = controlCommand(
  'disconnect',
  'Connect, then disconnect cleanly (connectivity check)',
  'disconnect',
  'Disconnected',
);
