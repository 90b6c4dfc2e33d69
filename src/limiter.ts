type Task = () => Promise<void>;

/**
 * Soft cap on concurrently running fetches. Work beyond the cap waits in
 * order and starts as running tasks finish.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private waiting: Task[] = [];

  constructor(private readonly maxConcurrent: number) {}

  /**
   * Schedule a task. The task must not reject: callers report failures through
   * their own channel.
   */
  schedule(task: Task): void {
    this.waiting.push(task);
    this.pump();
  }

  get running(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiting.length;
  }

  private pump(): void {
    while (this.active < this.maxConcurrent) {
      const next = this.waiting.shift();
      if (!next) return;
      this.active++;
      void next().finally(() => {
        this.active--;
        this.pump();
      });
    }
  }
}
