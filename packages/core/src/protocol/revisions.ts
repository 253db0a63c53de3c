import { UnsupportedOperationError, toHex32 } from '@netdump/shared';
import type {
  CommandName,
  DecodedCommand,
  ProtocolRevision,
  ResponseStatus,
  StatusName,
} from './types.ts';

export const DEFAULT_PROTOCOL_VERSION = 1;

const DISC_COMMANDS = {
  ejectDisc: 1,
  getDiscInfo: 2,
  dumpBca: 3,
  dumpGame: 4,
} as const;

const BASE_STATUSES = {
  protocolError: 0xffff_ffff,
  noDisc: 0xffff_fffe,
  ok: 0,
  discInfo: 1,
  bca: 2,
  game: 3,
} as const;

// Revisions are not wire-compatible: the same code means different things
// (0xFFFFFFFE is Shutdown in v0 and ExitProgram in v1).
const REVISIONS: ReadonlyMap<number, ProtocolRevision> = new Map([
  [0, {
    version: 0,
    commands: { disconnect: 0xffff_ffff, shutdown: 0xffff_fffe, ...DISC_COMMANDS },
    statuses: BASE_STATUSES,
    gamePayload: 'single-length',
  }],
  [1, {
    version: 1,
    commands: {
      disconnect: 0xffff_ffff,
      exitProgram: 0xffff_fffe,
      shutdown: 0xffff_fffd,
      ...DISC_COMMANDS,
    },
    statuses: {
      ...BASE_STATUSES,
      couldNotEject: 0xffff_fffd,
      unknownDiscType: 0xffff_fffc,
    },
    gamePayload: 'single-length',
  }],
  [2, {
    version: 2,
    commands: { disconnect: 0xffff_ffff, shutdown: 0xffff_fffd, ...DISC_COMMANDS },
    statuses: BASE_STATUSES,
    gamePayload: 'chunked',
  }],
]);

export function supportedVersions(): number[] {
  return [...REVISIONS.keys()];
}

export function getRevision(version: number): ProtocolRevision {
  const revision = REVISIONS.get(version);
  if (!revision) {
    throw new UnsupportedOperationError(
      `Unknown protocol version ${version} (supported: ${supportedVersions().join(', ')})`,
    );
  }
  return revision;
}

export function hasCommand(revision: ProtocolRevision, command: CommandName): boolean {
  return revision.commands[command] !== undefined;
}

export function commandCode(revision: ProtocolRevision, command: CommandName): number {
  const code = revision.commands[command];
  if (code === undefined) {
    throw new UnsupportedOperationError(
      `Command "${command}" is not part of protocol version ${revision.version}`,
    );
  }
  return code;
}

export function statusCode(revision: ProtocolRevision, status: StatusName): number {
  const code = revision.statuses[status];
  if (code === undefined) {
    throw new UnsupportedOperationError(
      `Status "${status}" is not part of protocol version ${revision.version}`,
    );
  }
  return code;
}

const COMMAND_NAMES: readonly CommandName[] = [
  'disconnect', 'exitProgram', 'shutdown', 'ejectDisc', 'getDiscInfo', 'dumpBca', 'dumpGame',
];

const STATUS_NAMES: readonly StatusName[] = [
  'protocolError', 'noDisc', 'couldNotEject', 'unknownDiscType', 'ok', 'discInfo', 'bca', 'game',
];

export function decodeStatus(revision: ProtocolRevision, code: number): ResponseStatus {
  const kind = STATUS_NAMES.find((name) => revision.statuses[name] === code);
  return kind ? { kind, code } : { kind: 'unknown', code };
}

export function decodeCommand(revision: ProtocolRevision, code: number): DecodedCommand {
  const kind = COMMAND_NAMES.find((name) => revision.commands[name] === code);
  return kind ? { kind, code } : { kind: 'unknown', code };
}

export function describeStatus(status: ResponseStatus): string {
  return status.kind === 'unknown'
    ? `unknown status ${toHex32(status.code)}`
    : `${status.kind} (${toHex32(status.code)})`;
}
