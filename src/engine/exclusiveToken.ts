import { clampTimerDelay } from './timerDelay';

export type ReleaseToken = () => void;

interface Waiter {
  grant: (release: ReleaseToken | null) => void;
  timer?: NodeJS.Timeout;
}

/**
 * Single-holder token with a FIFO wait queue. Release hands the token straight to
 * the oldest waiter, so acquisition order is arrival order.
 */
export class ExclusiveToken {
  private held = false;
  private readonly waiters: Waiter[] = [];

  public get isHeld(): boolean {
    return this.held;
  }

  public get queueDepth(): number {
    return this.waiters.length;
  }

  /** Resolves with a release function, or null if not granted within `timeoutMs`. */
  public acquire(timeoutMs: number): Promise<ReleaseToken | null> {
    if (!this.held && this.waiters.length === 0) {
      this.held = true;
      return Promise.resolve(this.createRelease());
    }
    if (timeoutMs <= 0) {
      return Promise.resolve(null);
    }

    return new Promise<ReleaseToken | null>((resolve) => {
      const waiter: Waiter = {
        grant: (release) => {
          if (waiter.timer) clearTimeout(waiter.timer);
          resolve(release);
        },
      };
      waiter.timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
          resolve(null);
        }
      }, clampTimerDelay(timeoutMs));
      this.waiters.push(waiter);
    });
  }

  /** Turns every queued waiter away; the current holder keeps the token. */
  public rejectWaiters(): number {
    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      waiter.grant(null);
    }
    return pending.length;
  }

  private createRelease(): ReleaseToken {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next.grant(this.createRelease());
      } else {
        this.held = false;
      }
    };
  }
}
