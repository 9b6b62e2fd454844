/**
 * A group of concurrently running tasks that is awaited and emptied as a unit.
 * Tasks start as soon as they are added.
 */
export class TaskGroup<T> {
  private pending: Array<Promise<T>> = [];

  get size(): number {
    return this.pending.length;
  }

  add(task: () => Promise<T>): void {
    this.pending.push(task());
  }

  async drain(): Promise<T[]> {
    const running = this.pending;
    this.pending = [];
    return Promise.all(running);
  }
}
