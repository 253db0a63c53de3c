import { formatBytes, formatPercent } from '@netdump/shared';
import type { ReceiveProgress } from '@netdump/core';

/** Single-line transfer progress on stderr, redrawn when the percentage moves. */
export class ProgressLine {
  private lastShown = '';
  private active = false;
  private readonly stream: NodeJS.WriteStream;

  constructor(stream: NodeJS.WriteStream = process.stderr) {
    this.stream = stream;
  }

  update({ received, total }: ReceiveProgress): void {
    const percent = formatPercent(received, total);
    if (percent === this.lastShown) return;
    this.lastShown = percent;
    this.active = true;
    this.stream.write(`\rReceived ${formatBytes(received)} of ${formatBytes(total)} (${percent})`);
  }

  finish(): void {
    if (this.active) this.stream.write('\n');
    this.active = false;
  }
}
