import { writeFileSync } from 'node:fs';
import type { CommandModule } from 'yargs';
import { formatDiscInfo } from '@netdump/core';
import type { DiscInfo } from '@netdump/core';
import { errorMessage } from '@netdump/shared';
import { stringArg } from '../args.ts';
import { EXIT_FATAL, runOperation } from '../run-operation.ts';

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/** The saved record keeps the snake_case keys existing consumers read. */
export function discInfoRecord(info: DiscInfo): Record<string, string> {
  return {
    disc_type: info.discType,
    game_name: info.gameName,
    internal_name: info.internalName,
  };
}

export const infoCommand: CommandModule = {
  command: 'info',
  describe: 'Show disc type, game name and internal name',
  builder: (yargs) =>
    yargs.option('output', {
      alias: 'o',
      describe: 'Write the info as JSON to this file instead of printing it',
      type: 'string',
    }),
  handler: async (argv) => {
    const outcome = await runOperation(argv, 'info');
    if (outcome?.kind !== 'disc-info') return;

    const output = stringArg(argv, 'output');
    if (!output) {
      console.log(formatDiscInfo(outcome.info));
      return;
    }
    try {
      writeFileSync(output, formatJson(discInfoRecord(outcome.info)) + '\n');
      console.error(`Disc info saved to ${output}`);
    } catch (err) {
      console.error(`Error: failed to write ${output}: ${errorMessage(err)}`);
      process.exitCode = EXIT_FATAL;
    }
  },
};
