/**
 * Pass-through queue: tasks run immediately, so client tests never wait on
 * the per-minute interval.
 */
export default class PQueue {
  isPaused = false;

  constructor(
    public readonly options: { intervalCap?: number; interval?: number; carryoverConcurrencyCount?: boolean } = {}
  ) {}

  async add<T>(fn: () => Promise<T> | T): Promise<T> {
    return fn();
  }

  get size(): number {
    return 0;
  }

  get pending(): number {
    return 0;
  }
}
