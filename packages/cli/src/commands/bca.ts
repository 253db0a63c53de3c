import type { CommandModule } from 'yargs';
import { createFileSink, createStdoutSink } from '@netdump/core';
import type { ByteSink, ProjectConfig } from '@netdump/core';
import { booleanArg, stringArg, type Argv } from '../args.ts';
import { runOperation } from '../run-operation.ts';

export const DEFAULT_BCA_PATH = './game.bca';

/** `--stdout` wins, then `--output`, then `output.bca` from netdump.json. */
export function openBcaSink(argv: Argv, config: ProjectConfig): Promise<ByteSink> {
  if (booleanArg(argv, 'stdout')) return Promise.resolve(createStdoutSink());
  return createFileSink(stringArg(argv, 'output') ?? config.output?.bca ?? DEFAULT_BCA_PATH);
}

export const bcaCommand: CommandModule = {
  command: 'bca',
  describe: 'Dump the disc BCA',
  builder: (yargs) =>
    yargs
      .option('output', {
        alias: 'o',
        describe: `Where to write the BCA (default: ${DEFAULT_BCA_PATH})`,
        type: 'string',
      })
      .option('stdout', {
        alias: 's',
        describe: 'Write the BCA to stdout; --output is ignored',
        type: 'boolean',
        default: false,
      }),
  handler: async (argv) => {
    const toStdout = booleanArg(argv, 'stdout');

    const outcome = await runOperation(argv, 'bca', {
      openSink: (config) => openBcaSink(argv, config),
    });
    if (outcome?.kind === 'bca' && !toStdout) {
      console.error(`Wrote ${outcome.bytes} bytes to ${outcome.sink}`);
    }
  },
};
