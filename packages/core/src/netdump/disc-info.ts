import { DecodeError, errorMessage } from '@netdump/shared';

export const DISC_TYPE_SIZE = 1;
export const GAME_NAME_SIZE = 32;
export const INTERNAL_NAME_SIZE = 512;
export const DISC_INFO_SIZE = DISC_TYPE_SIZE + GAME_NAME_SIZE + INTERNAL_NAME_SIZE;

export type DiscType = 'GC' | 'WiiSingleSided' | 'WiiDoubleSided';

// Indexed by the wire byte.
const DISC_TYPES: readonly DiscType[] = ['GC', 'WiiSingleSided', 'WiiDoubleSided'];

export const DISC_TYPE_LABELS: Record<DiscType, string> = {
  GC: 'GameCube',
  WiiSingleSided: 'Wii Single-Sided',
  WiiDoubleSided: 'Wii Double-Sided',
};

export interface DiscInfo {
  discType: DiscType;
  gameName: string;
  internalName: string;
}

export function decodeDiscType(byte: number): DiscType {
  const discType = DISC_TYPES[byte];
  if (discType === undefined) {
    throw new DecodeError(`Unknown disc type byte 0x${byte.toString(16).padStart(2, '0')}`);
  }
  return discType;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Strips trailing NULs only, then decodes strict UTF-8. */
export function decodeNameField(field: Buffer, label: string): string {
  let end = field.length;
  while (end > 0 && field[end - 1] === 0) end--;
  try {
    return utf8.decode(field.subarray(0, end));
  } catch (err) {
    throw new DecodeError(`${label} is not valid UTF-8: ${errorMessage(err)}`);
  }
}

export function decodeDiscInfo(payload: Buffer): DiscInfo {
  if (payload.length !== DISC_INFO_SIZE) {
    throw new DecodeError(`Disc info must be ${DISC_INFO_SIZE} bytes, got ${payload.length}`);
  }
  const nameStart = DISC_TYPE_SIZE;
  const internalStart = nameStart + GAME_NAME_SIZE;
  return {
    discType: decodeDiscType(payload[0]),
    gameName: decodeNameField(payload.subarray(nameStart, internalStart), 'Game name'),
    internalName: decodeNameField(payload.subarray(internalStart), 'Internal name'),
  };
}

export function formatDiscInfo(info: DiscInfo): string {
  return [
    `Disc Type: ${DISC_TYPE_LABELS[info.discType]}`,
    `Game Name: ${info.gameName}`,
    `Internal Name: ${info.internalName}`,
  ].join('\n');
}
