import {
  DEFAULT_PORT,
  DEFAULT_PROTOCOL_VERSION,
  NetdumpClient,
  loadProjectConfig,
} from '@netdump/core';
import type { ProjectConfig, SessionFactory } from '@netdump/core';
import { numberArg, projectDir, stringArg, type Argv } from './args.ts';

export interface ResolvedConnection {
  host: string;
  port: number;
  protocolVersion: number;
  timeoutMs: number | undefined;
}

export function getProjectConfig(argv: Argv): ProjectConfig {
  return loadProjectConfig(projectDir(argv));
}

/** Command-line flags win over netdump.json, which wins over built-in defaults. */
export function resolveConnection(argv: Argv, config: ProjectConfig): ResolvedConnection {
  const host = stringArg(argv, 'address') ?? config.host;
  if (!host) {
    throw new Error('No console address: pass --address or set "host" in netdump.json');
  }
  return {
    host,
    port: numberArg(argv, 'port') ?? config.port ?? DEFAULT_PORT,
    protocolVersion: numberArg(argv, 'protocol-version') ?? config.protocolVersion ?? DEFAULT_PROTOCOL_VERSION,
    timeoutMs: numberArg(argv, 'timeout') ?? config.timeoutMs,
  };
}

export function createClient(connection: ResolvedConnection, connect?: SessionFactory): NetdumpClient {
  const client = new NetdumpClient({ ...connection, connect });
  client.on('warning', (message: string) => console.warn(`Warning: ${message}`));
  return client;
}
