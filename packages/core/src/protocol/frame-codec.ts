/**
 * NETDUMP frame codec.
 *
 * Request:  [magic "NETDUMP" (7)][version u32 BE][command u32 BE]
 * Response: [magic "NETDUMP" (7)][version u32 BE][status u32 BE][payload...]
 */

import { FramingError } from '@netdump/shared';
import type { CommandName, DecodedCommand, ProtocolRevision, StatusName } from './types.ts';
import { commandCode, decodeCommand, statusCode } from './revisions.ts';

export const MAGIC = Buffer.from('NETDUMP', 'ascii');
export const MAGIC_SIZE = MAGIC.length;
export const VERSION_SIZE = 4;
export const CODE_SIZE = 4;
export const HEADER_SIZE = MAGIC_SIZE + VERSION_SIZE;
export const FRAME_SIZE = HEADER_SIZE + CODE_SIZE;

function encodeFrame(revision: ProtocolRevision, code: number): Buffer {
  const frame = Buffer.alloc(FRAME_SIZE);
  MAGIC.copy(frame, 0);
  frame.writeUInt32BE(revision.version, MAGIC_SIZE);
  frame.writeUInt32BE(code, HEADER_SIZE);
  return frame;
}

export function encodeRequest(revision: ProtocolRevision, command: CommandName): Buffer {
  return encodeFrame(revision, commandCode(revision, command));
}

export function encodeResponseHeader(
  revision: ProtocolRevision,
  status: StatusName | number,
): Buffer {
  const code = typeof status === 'number' ? status : statusCode(revision, status);
  return encodeFrame(revision, code);
}

export function checkMagic(bytes: Buffer): void {
  if (!bytes.equals(MAGIC)) {
    throw new FramingError(
      `Bad magic number: expected ${MAGIC.toString('hex')}, got ${bytes.toString('hex')}`,
    );
  }
}

export function checkVersion(revision: ProtocolRevision, bytes: Buffer): void {
  if (bytes.length !== VERSION_SIZE) {
    throw new FramingError(`Truncated protocol version (${bytes.length} bytes)`);
  }
  const version = bytes.readUInt32BE(0);
  if (version !== revision.version) {
    throw new FramingError(
      `Protocol version mismatch: expected ${revision.version}, got ${version}`,
    );
  }
}

/** Validates the 11-byte magic + version prefix shared by every frame. */
export function checkHeader(revision: ProtocolRevision, header: Buffer): void {
  if (header.length < HEADER_SIZE) {
    throw new FramingError(`Truncated frame header (${header.length} bytes)`);
  }
  checkMagic(header.subarray(0, MAGIC_SIZE));
  checkVersion(revision, header.subarray(MAGIC_SIZE, HEADER_SIZE));
}

export function decodeRequest(revision: ProtocolRevision, frame: Buffer): DecodedCommand {
  if (frame.length !== FRAME_SIZE) {
    throw new FramingError(`Request frame must be ${FRAME_SIZE} bytes, got ${frame.length}`);
  }
  checkHeader(revision, frame);
  return decodeCommand(revision, frame.readUInt32BE(HEADER_SIZE));
}
