type Job = () => Promise<void>;

/**
 * Runs async tasks one at a time, in submission order.
 */
export class SerialLock {
  private list: Job[] = [];
  private processing = false;

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.list.push(async () => {
        try {
          resolve(await task());
        } catch (e) {
          reject(e instanceof Error ? e : new Error(String(e)));
        }
      });
      void this.drain();
    });
  }

  get busy(): boolean {
    return this.processing;
  }

  size(): number {
    return this.list.length;
  }

  private async drain(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    let job = this.list.shift();
    while (job) {
      await job();
      job = this.list.shift();
    }
    this.processing = false;
  }
}
