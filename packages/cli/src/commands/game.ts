import type { CommandModule } from 'yargs';
import { createFileSink, createStdoutSink } from '@netdump/core';
import type { ByteSink, ProjectConfig } from '@netdump/core';
import { formatBytes } from '@netdump/shared';
import { booleanArg, stringArg, type Argv } from '../args.ts';
import { runOperation } from '../run-operation.ts';

export const DEFAULT_GAME_PATH = './game.iso';

/** `--stdout` wins, then `--output`, then `output.game` from netdump.json. */
export function openGameSink(argv: Argv, config: ProjectConfig): Promise<ByteSink> {
  if (booleanArg(argv, 'stdout')) return Promise.resolve(createStdoutSink());
  return createFileSink(stringArg(argv, 'output') ?? config.output?.game ?? DEFAULT_GAME_PATH);
}

export const gameCommand: CommandModule = {
  command: 'game',
  describe: 'Dump the disc image',
  builder: (yargs) =>
    yargs
      .option('output', {
        alias: 'o',
        describe: `Where to write the image (default: ${DEFAULT_GAME_PATH})`,
        type: 'string',
      })
      .option('stdout', {
        alias: 's',
        describe: 'Write the image to stdout; --output is ignored',
        type: 'boolean',
        default: false,
      }),
  handler: async (argv) => {
    const toStdout = booleanArg(argv, 'stdout');

    const outcome = await runOperation(argv, 'game', {
      openSink: (config) => openGameSink(argv, config),
      showProgress: !toStdout && process.stderr.isTTY === true,
    });
    if (outcome?.kind === 'game') {
      console.error(`Wrote ${formatBytes(outcome.bytes)} (${outcome.bytes} bytes) to ${outcome.sink}`);
    }
  },
};
