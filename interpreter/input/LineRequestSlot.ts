import type { LineCallback } from '@core/types/console';

/**
 * Holds the single outstanding line request. Registering a new callback
 * cancels the previous one by calling it with `null` first.
 */
export class LineRequestSlot {
  private pending?: LineCallback;

  register(callback: LineCallback): void {
    const previous = this.pending;
    this.pending = undefined;
    previous?.(null);
    this.pending = callback;
  }

  /** Hands a line to the waiting callback; false when nobody is waiting */
  deliver(line: string | null): boolean {
    const callback = this.pending;
    if (!callback) {
      return false;
    }
    this.pending = undefined;
    callback(line);
    return true;
  }

  cancel(): boolean {
    return this.deliver(null);
  }

  get isWaiting(): boolean {
    return this.pending !== undefined;
  }
}
