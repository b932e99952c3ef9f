/**
 * Delayed reusable-script starts queued by <after>
 */

export interface DueScript {
  name: string;
  args: string | null;
}

interface Timer {
  remaining: number;
  args: string | null;
}

/**
 * One timer per script name; queuing a name again replaces its timer
 */
export class AfterTimers {
  private readonly timers = new Map<string, Timer>();

  get size(): number {
    return this.timers.size;
  }

  has(name: string): boolean {
    return this.timers.has(name);
  }

  add(name: string, seconds: number, args: string | null): void {
    this.timers.set(name, { remaining: seconds, args });
  }

  cancel(name: string): boolean {
    return this.timers.delete(name);
  }

  cancelAll(): void {
    this.timers.clear();
  }

  /**
   * Count every timer down by the frame delta
   * @returns scripts whose time is up, in the order they were queued
   */
  advance(delta: number): DueScript[] {
    const due: DueScript[] = [];
    for (const [name, timer] of this.timers) {
      timer.remaining -= delta;
      if (timer.remaining <= 0) {
        due.push({ name, args: timer.args });
      }
    }
    for (const { name } of due) {
      this.timers.delete(name);
    }
    return due;
  }
}
