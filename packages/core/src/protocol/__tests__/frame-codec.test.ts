import { describe, it, expect } from 'vitest';
import { FramingError, UnsupportedOperationError } from '@netdump/shared';
import {
  FRAME_SIZE,
  HEADER_SIZE,
  MAGIC,
  checkHeader,
  decodeRequest,
  encodeRequest,
  encodeResponseHeader,
} from '../frame-codec.ts';
import { getRevision } from '../revisions.ts';
import type { CommandName } from '../types.ts';

const v0 = getRevision(0);
const v1 = getRevision(1);

describe('NETDUMP frame codec', () => {
  it('encodes a request as magic, version and command, big-endian', () => {
    const frame = encodeRequest(v1, 'ejectDisc');
    expect(frame.length).toBe(FRAME_SIZE);
    expect(frame).toEqual(
      Buffer.concat([Buffer.from('NETDUMP', 'ascii'), Buffer.from([0, 0, 0, 1, 0, 0, 0, 1])]),
    );
  });

  it('encodes sentinel command codes', () => {
    expect(encodeRequest(v1, 'disconnect').subarray(HEADER_SIZE)).toEqual(Buffer.from([0xff, 0xff, 0xff, 0xff]));
    expect(encodeRequest(v1, 'exitProgram').readUInt32BE(HEADER_SIZE)).toBe(0xfffffffe);
    expect(encodeRequest(v1, 'shutdown').readUInt32BE(HEADER_SIZE)).toBe(0xfffffffd);
  });

  it('uses the older shutdown code for version 0', () => {
    const frame = encodeRequest(v0, 'shutdown');
    expect(frame.readUInt32BE(MAGIC.length)).toBe(0);
    expect(frame.readUInt32BE(HEADER_SIZE)).toBe(0xfffffffe);
  });

  it('refuses commands the revision does not define', () => {
    expect(() => encodeRequest(v0, 'exitProgram')).toThrow(UnsupportedOperationError);
  });

  it('decodes what it encodes', () => {
    const commands: CommandName[] = [
      'disconnect', 'exitProgram', 'shutdown', 'ejectDisc', 'getDiscInfo', 'dumpBca', 'dumpGame',
    ];
    for (const command of commands) {
      expect(decodeRequest(v1, encodeRequest(v1, command)).kind).toBe(command);
    }
  });

  it('decodes an unrecognised command code to the unknown variant', () => {
    const frame = encodeResponseHeader(v1, 99);
    expect(decodeRequest(v1, frame)).toEqual({ kind: 'unknown', code: 99 });
  });

  it('rejects request frames of the wrong size', () => {
    expect(() => decodeRequest(v1, Buffer.alloc(14))).toThrow(FramingError);
  });
});

describe('header validation', () => {
  const header = encodeResponseHeader(v1, 'ok').subarray(0, HEADER_SIZE);

  it('accepts the expected magic and version', () => {
    expect(() => checkHeader(v1, header)).not.toThrow();
  });

  it('rejects every single-byte mutation of magic or version', () => {
    for (let i = 0; i < HEADER_SIZE; i++) {
      const mutated = Buffer.from(header);
      mutated[i] ^= 0xff;
      expect(() => checkHeader(v1, mutated)).toThrow(FramingError);
    }
  });

  it('rejects a header from another protocol version', () => {
    const other = encodeResponseHeader(v0, 'ok').subarray(0, HEADER_SIZE);
    expect(() => checkHeader(v1, other)).toThrow('Protocol version mismatch: expected 1, got 0');
  });

  it('rejects a truncated header', () => {
    expect(() => checkHeader(v1, header.subarray(0, 5))).toThrow(FramingError);
  });
});
