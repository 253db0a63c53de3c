import type { CommandModule } from 'yargs';
import { runOperation } from '../run-operation.ts';

export const fullCommand: CommandModule = {
  command: 'full',
  describe: 'Dump game, BCA and info in one go (not supported by the protocol)',
  handler: async (argv) => {
    await runOperation(argv, 'full');
  },
};
