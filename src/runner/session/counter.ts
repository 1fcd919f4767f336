/* src/runner/session/counter.ts
 * Step counter: the only cross-step mutable state of a run. Owned by the
 * matrix driver and handed to the session runner; never reset mid-run.
 */
export class StepCounter {
  private value = 0;

  /** Allocate the next step number (1, 2, 3, ...). */
  next(): number {
    this.value += 1;
    return this.value;
  }

  /** Last number handed out (0 before the first step). */
  get current(): number {
    return this.value;
  }
}
