export class NetdumpError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConnectionError extends NetdumpError {
  constructor(message: string) {
    super(message, 'CONNECTION');
  }
}

/** Magic or version mismatch, or a payload whose declared lengths do not add up. */
export class FramingError extends NetdumpError {
  constructor(message: string) {
    super(message, 'FRAMING');
  }
}

export class TimeoutError extends NetdumpError {
  constructor(message: string) {
    super(message, 'TIMEOUT');
  }
}

export class DecodeError extends NetdumpError {
  constructor(message: string) {
    super(message, 'DECODE');
  }
}

export class SinkError extends NetdumpError {
  constructor(message: string) {
    super(message, 'SINK');
  }
}

export class UnsupportedOperationError extends NetdumpError {
  constructor(message: string) {
    super(message, 'UNSUPPORTED');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
