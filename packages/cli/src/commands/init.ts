import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { CommandModule } from 'yargs';
import { CONFIG_FILENAME, writeProjectConfig } from '@netdump/core';
import type { ProjectConfig } from '@netdump/core';
import { booleanArg, numberArg, projectDir, stringArg } from '../args.ts';

export const initCommand: CommandModule = {
  command: 'init',
  describe: 'Create a netdump.json project config',
  builder: (yargs) =>
    yargs.option('force', {
      alias: 'f',
      describe: 'Overwrite existing config',
      type: 'boolean',
      default: false,
    }),
  handler: async (argv) => {
    const dir = projectDir(argv);
    const configPath = join(dir, CONFIG_FILENAME);

    if (existsSync(configPath) && !booleanArg(argv, 'force')) {
      console.error(`${CONFIG_FILENAME} already exists. Use --force to overwrite.`);
      process.exitCode = 1;
      return;
    }

    const config: ProjectConfig = {};
    const host = stringArg(argv, 'address');
    if (host) config.host = host;
    const port = numberArg(argv, 'port');
    if (port !== undefined) config.port = port;
    const protocolVersion = numberArg(argv, 'protocol-version');
    if (protocolVersion !== undefined) config.protocolVersion = protocolVersion;
    const timeoutMs = numberArg(argv, 'timeout');
    if (timeoutMs !== undefined) config.timeoutMs = timeoutMs;

    writeProjectConfig(dir, config);
    console.log(`Created ${configPath}`);
    if (config.host) console.log(`  host: ${config.host}`);
    if (config.port !== undefined) console.log(`  port: ${config.port}`);
    if (config.protocolVersion !== undefined) console.log(`  protocolVersion: ${config.protocolVersion}`);
  },
};
