/**
 * Tracks the components currently being activated, in activation order.
 * enter/leave must be balanced (use try/finally).
 */
export class CycleDetector {
  private readonly activating: string[] = [];

  enter(name: string): void {
    this.activating.push(name);
  }

  leave(name: string): void {
    const index = this.activating.lastIndexOf(name);
    if (index >= 0) this.activating.splice(index, 1);
  }

  isActivating(name: string): boolean {
    return this.activating.includes(name);
  }

  /** Names being activated, outermost first. */
  chain(): string[] {
    return [...this.activating];
  }
}
