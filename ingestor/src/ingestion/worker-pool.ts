export type WorkerPoolConfig = {
  maxConcurrent: number;
};

type QueuedJob = () => void;

/** Fixed number of slots; extra jobs wait in FIFO order. */
export class WorkerPool {
  private readonly maxConcurrent: number;
  private _active = 0;
  private _completed = 0;
  private readonly queue: QueuedJob[] = [];

  constructor(config: WorkerPoolConfig) {
    if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${config.maxConcurrent}`);
    }
    this.maxConcurrent = config.maxConcurrent;
  }

  get activeCount(): number {
    return this._active;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  get completedCount(): number {
    return this._completed;
  }

  submit<T>(run: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const job: QueuedJob = () => this.execute(run, resolve, reject);

      if (this._active < this.maxConcurrent) {
        job();
      } else {
        this.queue.push(job);
      }
    });
  }

  private execute<T>(
    run: () => Promise<T>,
    resolve: (value: T) => void,
    reject: (error: Error) => void,
  ): void {
    this._active++;

    const finish = (): void => {
      this._active--;
      this._completed++;
      this.drain();
    };

    let started: Promise<T>;
    try {
      started = run();
    } catch (err) {
      started = Promise.reject(err);
    }

    started.then(
      (value) => {
        finish();
        resolve(value);
      },
      (err: unknown) => {
        finish();
        reject(err instanceof Error ? err : new Error(String(err)));
      },
    );
  }

  private drain(): void {
    while (this._active < this.maxConcurrent) {
      const next = this.queue.shift();
      if (!next) return;
      next();
    }
  }
}
