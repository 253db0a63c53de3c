import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { supportedVersions } from '../protocol/revisions.ts';

export interface ProjectConfig {
  host?: string;
  port?: number;
  protocolVersion?: number;
  timeoutMs?: number;
  output?: { game?: string; bca?: string };
}

export const CONFIG_FILENAME = 'netdump.json';
export const DEFAULT_PORT = 9875;

export function loadProjectConfig(projectDir: string): ProjectConfig {
  const filePath = join(projectDir, CONFIG_FILENAME);
  if (!existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new Error(`Failed to parse ${filePath}: ${err instanceof Error ? err.message : err}`);
  }

  return validateConfig(raw, filePath);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 && value <= 65535;
}

export function validateConfig(raw: unknown, filePath: string): ProjectConfig {
  if (!isObject(raw)) {
    throw new Error(`${filePath}: config must be a JSON object`);
  }

  const config: ProjectConfig = {};

  const knownKeys = new Set(['host', 'port', 'protocolVersion', 'timeoutMs', 'output']);
  for (const key of Object.keys(raw)) {
    if (!knownKeys.has(key)) {
      console.warn(`Warning: unknown key "${key}" in ${filePath}`);
    }
  }

  const host = raw['host'];
  if (host !== undefined) {
    if (typeof host !== 'string' || host.trim().length === 0) throw new Error(`${filePath}: "host" must be a non-empty string`);
    config.host = host;
  }

  const port = raw['port'];
  if (port !== undefined) {
    if (!isPort(port)) throw new Error(`${filePath}: "port" must be an integer between 1 and 65535`);
    config.port = port;
  }

  const protocolVersion = raw['protocolVersion'];
  if (protocolVersion !== undefined) {
    const versions = supportedVersions();
    if (typeof protocolVersion !== 'number' || !versions.includes(protocolVersion)) {
      throw new Error(`${filePath}: "protocolVersion" must be one of ${versions.join(', ')}`);
    }
    config.protocolVersion = protocolVersion;
  }

  const timeoutMs = raw['timeoutMs'];
  if (timeoutMs !== undefined) {
    if (typeof timeoutMs !== 'number' || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new Error(`${filePath}: "timeoutMs" must be a positive number`);
    }
    config.timeoutMs = timeoutMs;
  }

  // output
  const output = raw['output'];
  if (output !== undefined) {
    if (!isObject(output)) {
      throw new Error(`${filePath}: "output" must be an object`);
    }
    config.output = {};
    if (output['game'] !== undefined) {
      if (typeof output['game'] !== 'string') throw new Error(`${filePath}: "output.game" must be a string`);
      config.output.game = output['game'];
    }
    if (output['bca'] !== undefined) {
      if (typeof output['bca'] !== 'string') throw new Error(`${filePath}: "output.bca" must be a string`);
      config.output.bca = output['bca'];
    }
  }

  return config;
}

export function writeProjectConfig(projectDir: string, config: ProjectConfig): void {
  const filePath = join(projectDir, CONFIG_FILENAME);
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n');
}
