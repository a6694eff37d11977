import type { ConventionDispatcher } from "./convention-dispatcher";

/**
 * Per-dispatch state handed to every convention of one event.
 *
 * A convention calls `stopProcessing()` to keep the remaining conventions
 * from running, or `stopProcessing(newResult)` when it replaced the object
 * the event was raised for.
 */
export class ConventionContext<T> {
  private stopped = false;
  private currentResult: T | undefined;

  constructor(
    private readonly dispatcher: ConventionDispatcher,
    result: T
  ) {
    this.currentResult = result;
  }

  get result(): T | undefined {
    return this.currentResult;
  }

  stopProcessing(...result: [] | [T | undefined]): void {
    this.stopped = true;
    if (result.length > 0) {
      this.currentResult = result[0];
    }
  }

  shouldStopProcessing(): boolean {
    return this.stopped;
  }

  /**
   * Run `action` with event delivery deferred. Events raised inside are
   * queued and dispatched in order once the outermost scope exits, even when
   * `action` throws.
   */
  delayConventions<R>(action: () => R): R {
    return this.dispatcher.delayConventions(action);
  }
}
