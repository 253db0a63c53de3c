import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import { SinkError } from '@netdump/shared';
import { StreamSink, createFileSink } from '../sink.ts';

class SlowWritable extends Writable {
  readonly received: Buffer[] = [];

  constructor() {
    super({ highWaterMark: 1 });
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    setImmediate(() => {
      this.received.push(chunk);
      callback();
    });
  }
}

class FailingWritable extends Writable {
  override _write(_chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    callback(new Error('disk full'));
  }
}

describe('StreamSink', () => {
  it('waits for drain and keeps write order', async () => {
    const stream = new SlowWritable();
    const sink = new StreamSink(stream, 'slow', true);

    await sink.write(Buffer.from('ab'));
    await sink.write(Buffer.from('cd'));
    await sink.write(Buffer.from('e'));
    await sink.close();

    expect(Buffer.concat(stream.received).toString()).toBe('abcde');
  });

  it('surfaces stream errors as SinkError', async () => {
    const sink = new StreamSink(new FailingWritable(), 'broken', true);

    await expect(sink.write(Buffer.from('x'))).rejects.toThrow(SinkError);
    await expect(sink.write(Buffer.from('y'))).rejects.toThrow('Failed writing to broken: disk full');
  });

  it('refuses writes after close', async () => {
    const sink = new StreamSink(new SlowWritable(), 'slow', true);
    await sink.close();
    await expect(sink.write(Buffer.from('x'))).rejects.toThrow('slow is already closed');
  });

  it('does not end a borrowed stream', async () => {
    const stream = new SlowWritable();
    const sink = new StreamSink(stream, 'borrowed', false);
    await sink.write(Buffer.from('x'));
    await sink.close();
    expect(stream.writableEnded).toBe(false);
  });
});

describe('createFileSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'netdump-sink-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes chunks to the file in order', async () => {
    const path = join(dir, 'game.iso');
    const sink = await createFileSink(path);
    await sink.write(Buffer.from([1, 2, 3]));
    await sink.write(Buffer.from([4]));
    await sink.close();

    expect(readFileSync(path)).toEqual(Buffer.from([1, 2, 3, 4]));
    expect(sink.description).toBe(path);
  });

  it('fails with SinkError when the file cannot be created', async () => {
    await expect(createFileSink(join(dir, 'missing', 'game.iso'))).rejects.toThrow(SinkError);
  });
});
