// Protocol
export type {
  CommandName,
  StatusName,
  ResponseStatus,
  DecodedCommand,
  GamePayloadShape,
  ProtocolRevision,
} from './protocol/types.ts';
export {
  DEFAULT_PROTOCOL_VERSION,
  supportedVersions,
  getRevision,
  hasCommand,
  commandCode,
  statusCode,
  decodeStatus,
  decodeCommand,
  describeStatus,
} from './protocol/revisions.ts';
export {
  MAGIC,
  HEADER_SIZE,
  FRAME_SIZE,
  encodeRequest,
  decodeRequest,
  encodeResponseHeader,
  checkHeader,
} from './protocol/frame-codec.ts';
export { SocketReader, IO_SIZE } from './protocol/socket-reader.ts';
export type { ByteSource } from './protocol/socket-reader.ts';

// Session and operations
export { NetdumpSession } from './netdump/session.ts';
export type { SessionOptions, SessionFactory, FrameSource } from './netdump/session.ts';
export { NetdumpClient, BCA_SIZE, FULL_DUMP_UNSUPPORTED } from './netdump/netdump-client.ts';
export type {
  Operation,
  OperationOutcome,
  NetdumpClientOptions,
  RunOptions,
} from './netdump/netdump-client.ts';
export { receiveGame, receiveSingleLength, receiveChunked } from './netdump/receiver.ts';
export type { ReceiveOptions, ReceiveProgress, ReceiveResult } from './netdump/receiver.ts';
export {
  DISC_INFO_SIZE,
  DISC_TYPE_LABELS,
  decodeDiscInfo,
  decodeDiscType,
  decodeNameField,
  formatDiscInfo,
} from './netdump/disc-info.ts';
export type { DiscInfo, DiscType } from './netdump/disc-info.ts';

// Sinks
export { StreamSink, createFileSink, createStdoutSink } from './sink/sink.ts';
export type { ByteSink } from './sink/sink.ts';

// Config
export type { ProjectConfig } from './config/index.ts';
export {
  CONFIG_FILENAME,
  DEFAULT_PORT,
  loadProjectConfig,
  validateConfig,
  writeProjectConfig,
} from './config/index.ts';
