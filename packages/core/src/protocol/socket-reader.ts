import type { Readable } from 'node:stream';
import { ConnectionError, FramingError } from '@netdump/shared';

export const IO_SIZE = 32768;

/** Exact-length reads over a byte stream. */
export interface ByteSource {
  readExact(length: number): Promise<Buffer>;
}

interface PendingRead {
  length: number;
  resolve: (data: Buffer) => void;
  reject: (err: Error) => void;
}

/**
 * Turns a flowing stream into exact-length reads. At most one read is
 * outstanding. The stream is paused while more than `highWaterMark` bytes sit
 * unread, so a multi-gigabyte transfer never piles up in memory.
 */
export class SocketReader implements ByteSource {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private pending: PendingRead | null = null;
  private failure: Error | null = null;
  private ended = false;
  private readonly stream: Readable;
  readonly highWaterMark: number;

  constructor(stream: Readable, highWaterMark = 4 * IO_SIZE) {
    this.stream = stream;
    this.highWaterMark = highWaterMark;

    stream.on('data', (chunk: Buffer) => this.onData(chunk));
    stream.on('end', () => this.onEnd());
    stream.on('close', () => this.onEnd());
    stream.on('error', (err) => {
      this.fail(new ConnectionError(`Socket error: ${err.message}`));
    });
  }

  get bufferedBytes(): number {
    return this.buffered;
  }

  readExact(length: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new Error('SocketReader: a read is already in progress'));
    }
    if (this.buffered >= length) {
      return Promise.resolve(this.take(length));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.reject(this.closedError(length));
    }
    return new Promise((resolve, reject) => {
      this.pending = { length, resolve, reject };
      if (this.stream.isPaused()) this.stream.resume();
    });
  }

  async readUInt32BE(): Promise<number> {
    return (await this.readExact(4)).readUInt32BE(0);
  }

  /** Reads a u64 length field; values beyond 2^53 - 1 cannot be tracked exactly. */
  async readLength64(): Promise<number> {
    const value = (await this.readExact(8)).readBigUInt64BE(0);
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new FramingError(`Declared length ${value} is too large`);
    }
    return Number(value);
  }

  /** Fails the outstanding read and every later one. The first failure wins. */
  fail(err: Error): void {
    if (!this.failure) this.failure = err;
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.reject(this.failure);
    }
  }

  private onData(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.buffered += chunk.length;

    const pending = this.pending;
    if (pending && this.buffered >= pending.length) {
      this.pending = null;
      pending.resolve(this.take(pending.length));
    }
    if (!this.pending && this.buffered > this.highWaterMark && !this.stream.isPaused()) {
      this.stream.pause();
    }
  }

  private onEnd(): void {
    if (this.ended) return;
    this.ended = true;
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.reject(this.failure ?? this.closedError(pending.length));
    }
  }

  private closedError(length: number): Error {
    return new ConnectionError(
      `Connection closed by peer (needed ${length} bytes, ${this.buffered} available)`,
    );
  }

  private take(length: number): Buffer {
    const out = Buffer.allocUnsafe(length);
    let offset = 0;
    while (offset < length) {
      const head = this.chunks[0];
      const n = Math.min(head.length, length - offset);
      head.copy(out, offset, 0, n);
      offset += n;
      if (n === head.length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = head.subarray(n);
      }
    }
    this.buffered -= length;

    if (this.stream.isPaused() && this.buffered <= this.highWaterMark) {
      this.stream.resume();
    }
    return out;
  }
}
