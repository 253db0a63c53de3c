import { FramingError } from '@netdump/shared';
import type { ByteSink } from '../sink/sink.ts';
import type { GamePayloadShape } from '../protocol/types.ts';
import { describeStatus } from '../protocol/revisions.ts';
import { IO_SIZE, type ByteSource } from '../protocol/socket-reader.ts';
import type { FrameSource } from './session.ts';

export interface ReceiveProgress {
  received: number;
  total: number;
}

export interface ReceiveOptions {
  /** Largest single read; defaults to the 32 KiB I/O buffer. */
  blockSize?: number;
  onProgress?: (progress: ReceiveProgress) => void;
}

export interface ReceiveResult {
  bytes: number;
  chunks: number;
}

/** Copies exactly `length` bytes from source to sink, at most `blockSize` per read. */
async function pump(
  source: ByteSource,
  sink: ByteSink,
  length: number,
  blockSize: number,
  onBlock: (size: number) => void,
): Promise<void> {
  let remaining = length;
  while (remaining > 0) {
    const size = Math.min(blockSize, remaining);
    const block = await source.readExact(size);
    await sink.write(block);
    remaining -= size;
    onBlock(size);
  }
}

/**
 * Single-length layout: one u64 BE total, then that many raw bytes.
 */
export async function receiveSingleLength(
  source: FrameSource,
  sink: ByteSink,
  options: ReceiveOptions = {},
): Promise<ReceiveResult> {
  const blockSize = options.blockSize ?? IO_SIZE;
  const total = await source.readLength64();
  let received = 0;

  await pump(source, sink, total, blockSize, (size) => {
    received += size;
    options.onProgress?.({ received, total });
  });

  return { bytes: received, chunks: total === 0 ? 0 : 1 };
}

/**
 * Chunked layout: each chunk is `[remaining u64][length u32][bytes]`. The
 * first chunk follows the Game header the caller already read; every later
 * chunk comes behind its own response frame, which must again carry Game.
 * The stream ends with the chunk whose length equals the remaining total.
 */
export async function receiveChunked(
  source: FrameSource,
  sink: ByteSink,
  options: ReceiveOptions = {},
): Promise<ReceiveResult> {
  const blockSize = options.blockSize ?? IO_SIZE;
  let total = 0;
  let received = 0;
  let chunks = 0;
  let expectedRemaining: number | null = null;

  while (true) {
    if (chunks > 0) {
      const status = await source.readResponseHeader();
      if (status.kind !== 'game') {
        throw new FramingError(
          `Transfer aborted after ${received} bytes: chunk ${chunks + 1} carried ${describeStatus(status)}`,
        );
      }
    }

    const remaining = await source.readLength64();
    const length = await source.readUInt32BE();

    if (expectedRemaining === null) {
      total = remaining;
    } else if (remaining !== expectedRemaining) {
      throw new FramingError(
        `Chunk ${chunks + 1} declares ${remaining} bytes remaining, expected ${expectedRemaining}`,
      );
    }
    if (length > remaining) {
      throw new FramingError(
        `Chunk ${chunks + 1} length ${length} exceeds remaining ${remaining}`,
      );
    }
    if (length === 0 && remaining > 0) {
      throw new FramingError(`Chunk ${chunks + 1} is empty with ${remaining} bytes remaining`);
    }

    await pump(source, sink, length, blockSize, (size) => {
      received += size;
      options.onProgress?.({ received, total });
    });
    chunks++;

    if (remaining === length) break;
    expectedRemaining = remaining - length;
  }

  return { bytes: received, chunks };
}

export function receiveGame(
  shape: GamePayloadShape,
  source: FrameSource,
  sink: ByteSink,
  options: ReceiveOptions = {},
): Promise<ReceiveResult> {
  switch (shape) {
    case 'single-length':
      return receiveSingleLength(source, sink, options);
    case 'chunked':
      return receiveChunked(source, sink, options);
  }
}
