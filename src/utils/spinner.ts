/**
 * Ora-backed spinner for long-running CLI steps
 */

import ora, { type Ora } from 'ora';

export class Spinner {
  private spinner: Ora;

  constructor(message: string = 'Working...') {
    this.spinner = ora({ text: message, spinner: 'dots' });
  }

  start(): void {
    this.spinner.start();
  }

  update(message: string): void {
    this.spinner.text = message;
  }

  stop(): void {
    this.spinner.stop();
  }

  succeed(message: string): void {
    this.spinner.succeed(message);
  }

  fail(message: string): void {
    this.spinner.fail(message);
  }

  get isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}
