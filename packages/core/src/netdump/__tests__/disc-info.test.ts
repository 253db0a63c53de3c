import { describe, it, expect } from 'vitest';
import { DecodeError } from '@netdump/shared';
import {
  DISC_INFO_SIZE,
  decodeDiscInfo,
  decodeDiscType,
  decodeNameField,
  formatDiscInfo,
} from '../disc-info.ts';
import { discInfoPayload, nulPadded } from '../../testing/index.ts';

describe('disc type', () => {
  it('maps the three known bytes', () => {
    expect(decodeDiscType(0x00)).toBe('GC');
    expect(decodeDiscType(0x01)).toBe('WiiSingleSided');
    expect(decodeDiscType(0x02)).toBe('WiiDoubleSided');
  });

  it('rejects anything else', () => {
    expect(() => decodeDiscType(0x03)).toThrow(DecodeError);
    expect(() => decodeDiscType(0xff)).toThrow('Unknown disc type byte 0xff');
  });
});

describe('name fields', () => {
  it('trims trailing NUL padding', () => {
    expect(decodeNameField(nulPadded('MARIO', 32), 'Game name')).toBe('MARIO');
  });

  it('keeps embedded NULs', () => {
    expect(decodeNameField(Buffer.from([0x41, 0x00, 0x42, 0x00, 0x00]), 'Game name')).toBe('A\u0000B');
  });

  it('decodes an all-NUL field to an empty string', () => {
    expect(decodeNameField(Buffer.alloc(32), 'Game name')).toBe('');
  });

  it('decodes multi-byte UTF-8', () => {
    expect(decodeNameField(nulPadded('Café', 32), 'Game name')).toBe('Café');
  });

  it('rejects invalid UTF-8', () => {
    const field = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.alloc(30)]);
    expect(() => decodeNameField(field, 'Game name')).toThrow(DecodeError);
  });
});

describe('decodeDiscInfo', () => {
  it('decodes the 545-byte record', () => {
    const payload = discInfoPayload(1, 'TESTGAME', 'Test Game Deluxe');
    expect(payload.length).toBe(DISC_INFO_SIZE);
    expect(decodeDiscInfo(payload)).toEqual({
      discType: 'WiiSingleSided',
      gameName: 'TESTGAME',
      internalName: 'Test Game Deluxe',
    });
  });

  it('rejects a record of the wrong size', () => {
    expect(() => decodeDiscInfo(Buffer.alloc(544))).toThrow(DecodeError);
  });

  it('formats a three-line summary', () => {
    expect(formatDiscInfo({ discType: 'GC', gameName: 'TESTGAME', internalName: 'Test Game' })).toBe(
      'Disc Type: GameCube\nGame Name: TESTGAME\nInternal Name: Test Game',
    );
  });
});
