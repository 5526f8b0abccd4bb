/**
 * Single-slot restartable timer
 *
 * Every schedule() cancels the pending run and starts the quiet period
 * again. Only the last scheduled run can fire.
 */

import type { Logger } from "./logger";

export class Debouncer {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private seq = 0;

  constructor(
    private readonly delayMs: number,
    private readonly logger: Logger
  ) {}

  /**
   * Schedule `run` after the quiet period, replacing any pending run.
   * @returns Sequence number of this scheduling
   */
  schedule(run: () => void): number {
    this.cancel();
    const seq = ++this.seq;
    this.timer = setTimeout(() => {
      this.timer = null;
      try {
        run();
      } catch (error) {
        this.logger.warn(`Debounced task #${seq} failed:`, error);
      }
    }, this.delayMs);
    return seq;
  }

  /** Drop the pending run, if any */
  cancel(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** True while a run is waiting for its quiet period */
  isPending(): boolean {
    return this.timer !== null;
  }
}
