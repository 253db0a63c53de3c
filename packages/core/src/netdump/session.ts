import { createConnection, type Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { ConnectionError, TimeoutError } from '@netdump/shared';
import type { CommandName, ProtocolRevision, ResponseStatus } from '../protocol/types.ts';
import { CODE_SIZE, MAGIC_SIZE, VERSION_SIZE, checkMagic, checkVersion, encodeRequest } from '../protocol/frame-codec.ts';
import { decodeStatus } from '../protocol/revisions.ts';
import { SocketReader, type ByteSource } from '../protocol/socket-reader.ts';

export interface SessionOptions {
  host: string;
  port: number;
  revision: ProtocolRevision;
  /** Idle timeout in ms. Unset means reads and writes wait forever. */
  timeoutMs?: number;
}

/** What the payload receivers need from a session. */
export interface FrameSource extends ByteSource {
  readResponseHeader(): Promise<ResponseStatus>;
  readUInt32BE(): Promise<number>;
  readLength64(): Promise<number>;
}

export type SessionFactory = (options: SessionOptions) => Promise<NetdumpSession>;

/**
 * One TCP connection to a NETDUMP server, used for exactly one operation.
 */
export class NetdumpSession implements FrameSource {
  readonly host: string;
  readonly port: number;
  readonly revision: ProtocolRevision;
  private readonly stream: Duplex;
  private readonly reader: SocketReader;
  private isClosed = false;

  constructor(stream: Duplex, options: SessionOptions) {
    this.stream = stream;
    this.host = options.host;
    this.port = options.port;
    this.revision = options.revision;
    this.reader = new SocketReader(stream);
  }

  static connect(options: SessionOptions): Promise<NetdumpSession> {
    return new Promise((resolve, reject) => {
      const socket: Socket = createConnection({ host: options.host, port: options.port });
      const target = `${options.host}:${options.port}`;

      const onConnectError = (err: Error): void => {
        socket.destroy();
        reject(new ConnectionError(`Failed to connect to ${target}: ${err.message}`));
      };
      socket.once('error', onConnectError);

      if (options.timeoutMs !== undefined) {
        socket.setTimeout(options.timeoutMs);
      }
      const onConnectTimeout = (): void => {
        socket.destroy();
        reject(new TimeoutError(`Timed out connecting to ${target} after ${options.timeoutMs} ms`));
      };
      socket.once('timeout', onConnectTimeout);

      socket.once('connect', () => {
        socket.off('error', onConnectError);
        socket.off('timeout', onConnectTimeout);
        socket.setNoDelay(true);
        const session = new NetdumpSession(socket, options);
        socket.on('timeout', () => {
          session.reader.fail(
            new TimeoutError(`No activity from ${target} for ${options.timeoutMs} ms`),
          );
          socket.destroy();
        });
        resolve(session);
      });
    });
  }

  /** Writes the 15-byte request frame in a single write. */
  sendCommand(command: CommandName): Promise<void> {
    const frame = encodeRequest(this.revision, command);
    return new Promise((resolve, reject) => {
      if (this.isClosed) {
        reject(new ConnectionError('Session is closed'));
        return;
      }
      this.stream.write(frame, (err) => {
        if (err) {
          reject(new ConnectionError(`Failed to send ${command}: ${err.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  async readResponseHeader(): Promise<ResponseStatus> {
    checkMagic(await this.reader.readExact(MAGIC_SIZE));
    checkVersion(this.revision, await this.reader.readExact(VERSION_SIZE));
    const code = (await this.reader.readExact(CODE_SIZE)).readUInt32BE(0);
    return decodeStatus(this.revision, code);
  }

  readExact(length: number): Promise<Buffer> {
    return this.reader.readExact(length);
  }

  readUInt32BE(): Promise<number> {
    return this.reader.readUInt32BE();
  }

  readLength64(): Promise<number> {
    return this.reader.readLength64();
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.stream.destroy();
  }
}
