import { EventEmitter } from 'node:events';
import { DecodeError, UnsupportedOperationError, errorMessage } from '@netdump/shared';
import type { CommandName, ProtocolRevision, ResponseStatus, StatusName } from '../protocol/types.ts';
import { DEFAULT_PROTOCOL_VERSION, describeStatus, getRevision, hasCommand } from '../protocol/revisions.ts';
import type { ByteSink } from '../sink/sink.ts';
import { NetdumpSession, type SessionFactory } from './session.ts';
import { DISC_INFO_SIZE, decodeDiscInfo, type DiscInfo } from './disc-info.ts';
import { receiveGame, type ReceiveProgress } from './receiver.ts';

export const BCA_SIZE = 64;

export type Operation =
  | 'disconnect'
  | 'exit'
  | 'shutdown'
  | 'eject'
  | 'info'
  | 'bca'
  | 'game'
  | 'full';

export type OperationOutcome =
  | { kind: 'ok'; operation: Operation }
  | { kind: 'disc-info'; info: DiscInfo }
  | { kind: 'bca'; bytes: number; sink: string }
  | { kind: 'game'; bytes: number; chunks: number; sink: string }
  | { kind: 'no-disc' }
  | { kind: 'could-not-eject' }
  | { kind: 'unknown-disc-type' }
  | { kind: 'protocol-error' }
  | { kind: 'unexpected-response'; status: ResponseStatus }
  | { kind: 'decode-error'; message: string }
  | { kind: 'unsupported'; operation: Operation; reason: string };

/** A combined game + BCA + info dump has no command of its own. */
export const FULL_DUMP_UNSUPPORTED: OperationOutcome = {
  kind: 'unsupported',
  operation: 'full',
  reason: 'a combined game + BCA + info dump has no NETDUMP command',
};

type Payload = 'none' | 'disc-info' | 'bca' | 'game';
type FailureStatus = 'noDisc' | 'couldNotEject' | 'unknownDiscType' | 'protocolError';

interface OperationSpec {
  command: CommandName;
  success: StatusName;
  payload: Payload;
  failures: readonly FailureStatus[];
  /** The remote side drops the session itself; no Disconnect follows. */
  endsSession: boolean;
}

const DISC_FAILURES: readonly FailureStatus[] = ['noDisc', 'unknownDiscType', 'protocolError'];

const OPERATIONS: Record<Exclude<Operation, 'full'>, OperationSpec> = {
  disconnect: { command: 'disconnect', success: 'ok', payload: 'none', failures: ['protocolError'], endsSession: true },
  exit: { command: 'exitProgram', success: 'ok', payload: 'none', failures: ['protocolError'], endsSession: true },
  shutdown: { command: 'shutdown', success: 'ok', payload: 'none', failures: ['protocolError'], endsSession: true },
  eject: {
    command: 'ejectDisc',
    success: 'ok',
    payload: 'none',
    failures: ['noDisc', 'couldNotEject', 'protocolError'],
    endsSession: false,
  },
  info: { command: 'getDiscInfo', success: 'discInfo', payload: 'disc-info', failures: DISC_FAILURES, endsSession: false },
  bca: { command: 'dumpBca', success: 'bca', payload: 'bca', failures: DISC_FAILURES, endsSession: false },
  game: { command: 'dumpGame', success: 'game', payload: 'game', failures: DISC_FAILURES, endsSession: false },
};

const FAILURE_OUTCOMES: Record<FailureStatus, OperationOutcome> = {
  noDisc: { kind: 'no-disc' },
  couldNotEject: { kind: 'could-not-eject' },
  unknownDiscType: { kind: 'unknown-disc-type' },
  protocolError: { kind: 'protocol-error' },
};

export interface NetdumpClientOptions {
  host: string;
  port: number;
  protocolVersion?: number;
  /** Idle timeout in ms; by default the client waits indefinitely. */
  timeoutMs?: number;
  /** Largest single read while streaming; defaults to 32 KiB. */
  blockSize?: number;
  connect?: SessionFactory;
}

export interface RunOptions {
  /** Opened only once the server has confirmed a payload is coming. */
  openSink?: () => Promise<ByteSink>;
}

function isFailureStatus(spec: OperationSpec, status: ResponseStatus): status is { kind: FailureStatus; code: number } {
  return spec.failures.some((failure) => failure === status.kind);
}

/**
 * Runs one NETDUMP operation per session: send the command, branch on the
 * status, read the payload if any, then disconnect politely.
 *
 * Events:
 * - `progress` ({@link ReceiveProgress}) while a game image streams in
 * - `warning` (string) for non-fatal teardown problems
 */
export class NetdumpClient extends EventEmitter {
  readonly host: string;
  readonly port: number;
  readonly revision: ProtocolRevision;
  private readonly timeoutMs: number | undefined;
  private readonly blockSize: number | undefined;
  private readonly connectSession: SessionFactory;

  constructor(options: NetdumpClientOptions) {
    super();
    this.host = options.host;
    this.port = options.port;
    this.revision = getRevision(options.protocolVersion ?? DEFAULT_PROTOCOL_VERSION);
    this.timeoutMs = options.timeoutMs;
    this.blockSize = options.blockSize;
    this.connectSession = options.connect ?? NetdumpSession.connect;
  }

  supports(operation: Operation): boolean {
    return operation !== 'full' && hasCommand(this.revision, OPERATIONS[operation].command);
  }

  async run(operation: Operation, options: RunOptions = {}): Promise<OperationOutcome> {
    if (operation === 'full') {
      return FULL_DUMP_UNSUPPORTED;
    }

    const spec = OPERATIONS[operation];
    if (!hasCommand(this.revision, spec.command)) {
      throw new UnsupportedOperationError(
        `"${operation}" is not available in protocol version ${this.revision.version}`,
      );
    }
    if ((spec.payload === 'bca' || spec.payload === 'game') && !options.openSink) {
      throw new Error(`"${operation}" needs an output sink`);
    }

    const session = await this.connectSession({
      host: this.host,
      port: this.port,
      revision: this.revision,
      timeoutMs: this.timeoutMs,
    });

    let outcome: OperationOutcome;
    try {
      outcome = await this.exchange(session, operation, spec, options);
    } catch (err) {
      session.close();
      throw err;
    }

    if (spec.endsSession) {
      session.close();
    } else {
      await this.teardown(session);
    }
    return outcome;
  }

  private async exchange(
    session: NetdumpSession,
    operation: Operation,
    spec: OperationSpec,
    options: RunOptions,
  ): Promise<OperationOutcome> {
    await session.sendCommand(spec.command);
    const status = await session.readResponseHeader();

    if (status.kind === spec.success) {
      return this.readPayload(session, operation, spec.payload, options);
    }
    if (isFailureStatus(spec, status)) {
      return FAILURE_OUTCOMES[status.kind];
    }
    // Anything else: stop reading, the payload size is unknowable.
    return { kind: 'unexpected-response', status };
  }

  private async readPayload(
    session: NetdumpSession,
    operation: Operation,
    payload: Payload,
    options: RunOptions,
  ): Promise<OperationOutcome> {
    switch (payload) {
      case 'none':
        return { kind: 'ok', operation };

      case 'disc-info': {
        const bytes = await session.readExact(DISC_INFO_SIZE);
        try {
          return { kind: 'disc-info', info: decodeDiscInfo(bytes) };
        } catch (err) {
          if (err instanceof DecodeError) {
            return { kind: 'decode-error', message: err.message };
          }
          throw err;
        }
      }

      case 'bca':
        return this.withSink(options, async (sink) => {
          const data = await session.readExact(BCA_SIZE);
          await sink.write(data);
          return { kind: 'bca', bytes: data.length, sink: sink.description };
        });

      case 'game':
        return this.withSink(options, async (sink) => {
          const result = await receiveGame(this.revision.gamePayload, session, sink, {
            blockSize: this.blockSize,
            onProgress: (progress: ReceiveProgress) => this.emit('progress', progress),
          });
          return { kind: 'game', bytes: result.bytes, chunks: result.chunks, sink: sink.description };
        });
    }
  }

  // Bytes already written stay written when the transfer fails part way.
  private async withSink(
    options: RunOptions,
    body: (sink: ByteSink) => Promise<OperationOutcome>,
  ): Promise<OperationOutcome> {
    if (!options.openSink) {
      throw new Error('No output sink');
    }
    const sink = await options.openSink();
    let outcome: OperationOutcome;
    try {
      outcome = await body(sink);
    } catch (err) {
      await sink.close().catch((closeErr: unknown) => {
        this.emit('warning', `Could not close ${sink.description}: ${errorMessage(closeErr)}`);
      });
      throw err;
    }
    await sink.close();
    return outcome;
  }

  private async teardown(session: NetdumpSession): Promise<void> {
    try {
      await session.sendCommand('disconnect');
      const status = await session.readResponseHeader();
      if (status.kind !== 'ok') {
        this.emit('warning', `Unexpected reply to disconnect (${describeStatus(status)}), closing anyway`);
      }
    } catch (err) {
      this.emit('warning', `Disconnect failed (${errorMessage(err)}), closing anyway`);
    } finally {
      session.close();
    }
  }
}
