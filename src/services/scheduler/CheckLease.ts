/**
 * Per-target exclusive lease: a check runs only while it holds the lease for
 * its target, and a firing that cannot acquire it is skipped, not queued.
 */
export class CheckLease {
  private readonly held = new Set<number>();

  /**
   * Returns a release function, or null when the target is already leased
   */
  tryAcquire(targetId: number): (() => void) | null {
    if (this.held.has(targetId)) {
      return null;
    }

    this.held.add(targetId);
    let released = false;

    return () => {
      if (!released) {
        released = true;
        this.held.delete(targetId);
      }
    };
  }

  isHeld(targetId: number): boolean {
    return this.held.has(targetId);
  }

  get size(): number {
    return this.held.size;
  }
}
