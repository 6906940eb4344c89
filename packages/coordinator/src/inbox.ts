/**
 * Serial inbox.
 *
 * Each coordinator owns one. Inbound messages and local operations are
 * queued and run one at a time in arrival order, so coordinator state is
 * only touched by a single job at any moment.
 *
 * A job that enqueues onto its own inbox and awaits the result deadlocks.
 * Coordinators call their private bodies from inside jobs.
 */
export class SerialInbox {
  private tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  /**
   * Queue a job. Resolves or rejects with the job's own outcome; a failed
   * job does not stop the ones behind it.
   */
  enqueue<T>(job: () => T | Promise<T>): Promise<T> {
    this._pending++;
    const result = this.tail.then(job);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  /** Jobs queued or running. */
  get pending(): number {
    return this._pending;
  }

  /** Resolves once every job queued so far, and any they queue, has settled. */
  async drain(): Promise<void> {
    while (this._pending > 0) {
      await this.tail;
    }
  }

  private settle(): void {
    this._pending--;
  }
}
