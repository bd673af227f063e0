import { ProgressReporter } from './types';

const SPINNER = ['⣾', '⣽', '⣻', '⢿', '⡿', '⣟', '⣯', '⣷'];

type Write = (chunk: string) => void;

/** Overwritable "computing" line with a rotating glyph, on stderr by default. */
export class SpinnerProgress implements ProgressReporter {
  private readonly write: Write;

  constructor(write?: Write) {
    this.write = write ?? ((chunk) => process.stderr.write(chunk));
  }

  tick(attempt: number): void {
    const spin = SPINNER[attempt % SPINNER.length];
    this.write(`\r\x1b[mcomputing\x1b[m ${spin} `);
  }

  clear(): void {
    this.write('\r');
  }
}

export const silentProgress: ProgressReporter = {
  tick: () => {},
  clear: () => {},
};
