import { open } from 'node:fs/promises';
import type { Writable } from 'node:stream';
import { SinkError, errorMessage } from '@netdump/shared';

/** Destination for payload bytes, written strictly in stream order. */
export interface ByteSink {
  readonly description: string;
  write(chunk: Buffer): Promise<void>;
  close(): Promise<void>;
}

/**
 * Adapts a Writable to ByteSink, waiting for `drain` whenever the stream's
 * buffer is full. `owned` streams are ended on close; borrowed ones (stdout)
 * are only flushed.
 */
export class StreamSink implements ByteSink {
  readonly description: string;
  private readonly stream: Writable;
  private readonly owned: boolean;
  private failure: SinkError | null = null;
  private isClosed = false;

  constructor(stream: Writable, description: string, owned: boolean) {
    this.stream = stream;
    this.description = description;
    this.owned = owned;
    stream.on('error', (err) => {
      if (!this.failure) {
        this.failure = new SinkError(`Failed writing to ${description}: ${err.message}`);
      }
    });
  }

  async write(chunk: Buffer): Promise<void> {
    this.throwIfFailed();
    if (this.isClosed) {
      throw new SinkError(`${this.description} is already closed`);
    }
    if (!this.stream.write(chunk)) {
      await this.waitFor('drain');
    }
    this.throwIfFailed();
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    this.throwIfFailed();
    if (this.owned) {
      const finished = this.waitFor('finish');
      this.stream.end();
      await finished;
    } else if (this.stream.writableNeedDrain) {
      await this.waitFor('drain');
    }
    this.throwIfFailed();
  }

  private throwIfFailed(): void {
    if (this.failure) throw this.failure;
  }

  private waitFor(event: 'drain' | 'finish'): Promise<void> {
    return new Promise((resolve, reject) => {
      const onEvent = (): void => {
        this.stream.off('error', onError);
        resolve();
      };
      const onError = (err: Error): void => {
        this.stream.off(event, onEvent);
        reject(this.failure ?? new SinkError(`Failed writing to ${this.description}: ${err.message}`));
      };
      this.stream.once(event, onEvent);
      this.stream.once('error', onError);
    });
  }
}

export async function createFileSink(path: string): Promise<ByteSink> {
  try {
    const handle = await open(path, 'w');
    return new StreamSink(handle.createWriteStream(), path, true);
  } catch (err) {
    throw new SinkError(`Failed to open ${path}: ${errorMessage(err)}`);
  }
}

export function createStdoutSink(): ByteSink {
  return new StreamSink(process.stdout, 'stdout', false);
}
