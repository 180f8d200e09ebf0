/**
 * Non-blocking mutual exclusion for one critical section per process.
 *
 * `tryAcquire` never waits: it returns a release function to the single
 * holder and `null` to everyone else. There is no queue of waiters.
 */
export class RefreshGuard {
  private held = false;

  get isHeld(): boolean {
    return this.held;
  }

  tryAcquire(): (() => void) | null {
    if (this.held) return null;
    this.held = true;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held = false;
    };
  }
}
