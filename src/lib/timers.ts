// src/lib/timers.ts

/** Pending timeouts that can all be cancelled at once, e.g. on unmount. */
export class TimerSet {
  private handles = new Set<ReturnType<typeof setTimeout>>();

  schedule(callback: () => void, delayMs: number): void {
    const handle = setTimeout(() => {
      this.handles.delete(handle);
      callback();
    }, delayMs);
    this.handles.add(handle);
  }

  clearAll(): void {
    for (const handle of this.handles) clearTimeout(handle);
    this.handles.clear();
  }

  get size(): number {
    return this.handles.size;
  }
}
