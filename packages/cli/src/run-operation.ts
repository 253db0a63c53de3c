import { DecodeError, UnsupportedOperationError, errorMessage } from '@netdump/shared';
import { FULL_DUMP_UNSUPPORTED, describeStatus } from '@netdump/core';
import type {
  ByteSink,
  Operation,
  OperationOutcome,
  ProjectConfig,
  ReceiveProgress,
  SessionFactory,
} from '@netdump/core';
import type { Argv } from './args.ts';
import { createClient, getProjectConfig, resolveConnection } from './resolve-client.ts';
import { ProgressLine } from './progress.ts';

export const EXIT_OK = 0;
/** The console answered, but with a failure (no disc, bad response, ...). */
export const EXIT_FAILURE = 1;
/** Connection, framing, timeout or local write failure. */
export const EXIT_FATAL = 2;

export function describeFailure(outcome: OperationOutcome): string | null {
  switch (outcome.kind) {
    case 'no-disc':
      return 'No disc present in the drive, can\'t proceed';
    case 'could-not-eject':
      return 'Couldn\'t eject the disc';
    case 'unknown-disc-type':
      return 'Unknown disc type, can\'t proceed';
    case 'protocol-error':
      return 'The console reported a protocol error, can\'t proceed';
    case 'unexpected-response':
      return `Unexpected response from the console: ${describeStatus(outcome.status)}`;
    case 'decode-error':
      return `Could not decode disc info: ${outcome.message}`;
    case 'unsupported':
      return `"${outcome.operation}" is not supported: ${outcome.reason}`;
    default:
      return null;
  }
}

export function exitCodeForError(err: unknown): number {
  return err instanceof UnsupportedOperationError || err instanceof DecodeError
    ? EXIT_FAILURE
    : EXIT_FATAL;
}

/** Prints a failed outcome and sets `process.exitCode`; returns successful outcomes. */
export function reportOutcome(outcome: OperationOutcome): OperationOutcome | null {
  const failure = describeFailure(outcome);
  if (failure) {
    console.error(failure);
    process.exitCode = EXIT_FAILURE;
    return null;
  }
  process.exitCode = EXIT_OK;
  return outcome;
}

export interface RunOperationOptions {
  /** Receives the netdump.json already loaded for this run. */
  openSink?: (config: ProjectConfig) => Promise<ByteSink>;
  /** Draw a progress line on stderr while a payload streams in. */
  showProgress?: boolean;
  connect?: SessionFactory;
}

/**
 * Runs one operation for a CLI command. Failures are printed to stderr and set
 * `process.exitCode`; only successful outcomes are returned.
 */
export async function runOperation(
  argv: Argv,
  operation: Operation,
  options: RunOperationOptions = {},
): Promise<OperationOutcome | null> {
  if (operation === 'full') {
    return reportOutcome(FULL_DUMP_UNSUPPORTED);
  }

  const progress = new ProgressLine();
  try {
    const config = getProjectConfig(argv);
    const client = createClient(resolveConnection(argv, config), options.connect);
    if (options.showProgress) {
      client.on('progress', (p: ReceiveProgress) => progress.update(p));
    }

    const { openSink } = options;
    const outcome = await client.run(operation, {
      openSink: openSink ? () => openSink(config) : undefined,
    });
    progress.finish();
    return reportOutcome(outcome);
  } catch (err) {
    progress.finish();
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = exitCodeForError(err);
    return null;
  }
}
