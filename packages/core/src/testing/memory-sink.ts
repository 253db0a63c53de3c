import type { ByteSink } from '../sink/sink.ts';

export class MemorySink implements ByteSink {
  readonly description: string;
  readonly writes: Buffer[] = [];
  closed = false;

  constructor(description = 'memory') {
    this.description = description;
  }

  get data(): Buffer {
    return Buffer.concat(this.writes);
  }

  async write(chunk: Buffer): Promise<void> {
    if (this.closed) throw new Error('MemorySink is closed');
    this.writes.push(Buffer.from(chunk));
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
