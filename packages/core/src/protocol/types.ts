export type CommandName =
  | 'disconnect'
  | 'exitProgram'
  | 'shutdown'
  | 'ejectDisc'
  | 'getDiscInfo'
  | 'dumpBca'
  | 'dumpGame';

export type StatusName =
  | 'protocolError'
  | 'noDisc'
  | 'couldNotEject'
  | 'unknownDiscType'
  | 'ok'
  | 'discInfo'
  | 'bca'
  | 'game';

export type ResponseStatus =
  | { kind: StatusName; code: number }
  | { kind: 'unknown'; code: number };

export type DecodedCommand =
  | { kind: CommandName; code: number }
  | { kind: 'unknown'; code: number };

/** How a DumpGame payload is laid out on the wire. */
export type GamePayloadShape = 'single-length' | 'chunked';

export interface ProtocolRevision {
  version: number;
  commands: Readonly<Partial<Record<CommandName, number>>>;
  statuses: Readonly<Partial<Record<StatusName, number>>>;
  gamePayload: GamePayloadShape;
}
