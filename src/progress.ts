import * as core from '@actions/core';

import type { ProgressFactory, ProgressReporter } from './types.js';

const STEP_PERCENT = 10;

/**
 * Reports copy progress through the action log.
 *
 * In verbose mode every message is printed with a `[current/total]` prefix.
 * Otherwise a percentage line is printed each time another 10% is reached.
 */
export class LogProgress implements ProgressReporter {
  private current = 0;
  private lastStep = 0;
  private closed = false;

  constructor(
    public readonly total: number,
    private readonly verbose = false
  ) {}

  get processed(): number {
    return this.current;
  }

  advance(amount = 1): void {
    if (this.closed) return;
    this.current += amount;
    if (!this.verbose) {
      this.reportStep();
    }
  }

  advanceWithMessage(message: string, amount = 1): void {
    if (this.closed) return;
    this.current += amount;

    if (this.verbose) {
      core.info(`[${this.current}/${this.total}] ${message}`);
    } else {
      this.reportStep();
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    core.debug(`Progress closed at ${this.current}/${this.total}`);
  }

  private reportStep(): void {
    if (this.total <= 0) return;

    const percent = Math.min(100, Math.floor((this.current / this.total) * 100));
    const step = Math.floor(percent / STEP_PERCENT);

    if (step > this.lastStep) {
      this.lastStep = step;
      core.info(`Copying files: ${percent}% (${this.current}/${this.total})`);
    }
  }
}

export const createLogProgress: ProgressFactory = (total, verbose) => new LogProgress(total, verbose);
