/**
 * Single-flight guard for backup cycles.
 *
 * The flag is checked and set in one synchronous step, so two callers on the
 * event loop can never both acquire it.
 */
export class CycleLock {
  private held = false;

  tryAcquire(): boolean {
    if (this.held) return false;
    this.held = true;
    return true;
  }

  release(): void {
    this.held = false;
  }

  isHeld(): boolean {
    return this.held;
  }
}
