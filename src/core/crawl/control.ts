/**
 * Cooperative stop/pause token shared by all workers of a run. Written by an
 * external controller (signal handler, queue job, test); workers only read it
 * at their suspension points.
 */

export type ControlDecision = "continue" | "stop";

export class CrawlControl {
  private stopped = false;
  private paused = false;
  private waiters: Array<() => void> = [];

  get isStopped(): boolean {
    return this.stopped;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  stop(): void {
    this.stopped = true;
    this.release();
  }

  pause(): void {
    if (!this.stopped) this.paused = true;
  }

  resume(): void {
    this.paused = false;
    this.release();
  }

  /**
   * Suspension point: waits while paused, then reports whether the caller
   * should carry on.
   */
  async checkpoint(): Promise<ControlDecision> {
    while (this.paused && !this.stopped) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    return this.stopped ? "stop" : "continue";
  }

  private release(): void {
    for (const wake of this.waiters.splice(0)) wake();
  }
}
