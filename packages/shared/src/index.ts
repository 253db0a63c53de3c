export {
  NetdumpError,
  ConnectionError,
  FramingError,
  TimeoutError,
  DecodeError,
  SinkError,
  UnsupportedOperationError,
  errorMessage,
} from './errors.ts';

export { formatBytes, formatPercent, toHex32 } from './format.ts';
