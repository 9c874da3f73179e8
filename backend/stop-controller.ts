/**
 * Graceful stop for a batch: sessions already running finish normally, problems not yet
 * started are recorded as cancelled.
 */
export class StopController {
  private stopRequested = false;
  private stopTriggered = false;

  requestStop(): void {
    this.stopRequested = true;
  }

  isStopRequested(): boolean {
    return this.stopRequested;
  }

  markStopTriggered(): void {
    this.stopTriggered = true;
  }

  /** True once the stop actually kept at least one problem from starting. */
  wasStopTriggered(): boolean {
    return this.stopTriggered;
  }
}
