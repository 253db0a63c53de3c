export {
  FakePeer,
  responseFrame,
  u32,
  u64,
  patternBytes,
  nulPadded,
  discInfoPayload,
} from './fake-peer.ts';
export type { PeerReply, PeerScript } from './fake-peer.ts';
export { MemorySink } from './memory-sink.ts';
