/**
 * ConventionDispatcher routes builder events to the conventions of a set.
 *
 * Responsibilities:
 * 1. Runs every convention implementing the event's handler, in set order
 * 2. Honors stopProcessing() and result replacement
 * 3. Queues events while a delayConventions() scope is open
 * 4. Bounds nested dispatch depth
 */

import { ConventionContext } from "./convention-context";
import { HANDLER_NAMES } from "./convention-events";
import type { ConventionEventKind, EventArgs, EventResult } from "./convention-events";
import type { ConventionSet } from "./convention-set";
import { ModelErrorCode, ModelStateError } from "../errors";
import { isLive } from "../type-guards";
import type { Logger } from "../logger";

export const DEFAULT_MAX_CONVENTION_DEPTH = 64;

export interface ConventionDispatcherOptions {
  maxConventionDepth?: number;
  logger?: Logger;
}

interface DelayedEvent {
  kind: ConventionEventKind;
  subject: unknown;
  run: () => void;
}

export class ConventionDispatcher {
  private readonly maxDepth: number;
  private readonly logger?: Logger;
  private depth = 0;
  private delayDepth = 0;
  private readonly delayed: DelayedEvent[] = [];

  constructor(
    readonly conventionSet: ConventionSet,
    options: ConventionDispatcherOptions = {}
  ) {
    this.maxDepth = options.maxConventionDepth ?? DEFAULT_MAX_CONVENTION_DEPTH;
    this.logger = options.logger;
  }

  get isDelaying(): boolean {
    return this.delayDepth > 0;
  }

  /**
   * Raise an event. Returns the final result, or undefined when the result
   * left the model. While delaying, the event is queued and `result` is
   * returned unchanged.
   */
  raise<K extends ConventionEventKind>(
    kind: K,
    result: EventResult<K>,
    ...args: EventArgs<K>
  ): EventResult<K> | undefined {
    if (this.delayDepth > 0) {
      this.delayed.push({
        kind,
        subject: args[0],
        run: () => {
          this.dispatch(kind, result, args);
        },
      });
      return result;
    }

    return this.dispatch(kind, result, args);
  }

  /**
   * Run `action` with events queued, then deliver the queue. A failure while
   * delivering discards the rest of the queue; when `action` itself failed,
   * its error is the one rethrown.
   */
  delayConventions<R>(action: () => R): R {
    this.delayDepth++;
    let failed = false;
    try {
      return action();
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      this.delayDepth--;
      if (this.delayDepth === 0) {
        this.flush(failed);
      }
    }
  }

  private flush(afterFailure: boolean): void {
    try {
      let event = this.delayed.shift();
      while (event) {
        if (isLive(event.subject)) {
          event.run();
        } else {
          this.logger?.trace({ event: event.kind }, "Dropped delayed event for removed subject");
        }
        event = this.delayed.shift();
      }
    } catch (error) {
      this.delayed.length = 0;
      if (!afterFailure) {
        throw error;
      }
      this.logger?.warn({ err: error }, "Delayed convention failed after its scope had already failed");
    }
  }

  private dispatch<K extends ConventionEventKind>(
    kind: K,
    result: EventResult<K>,
    args: EventArgs<K>
  ): EventResult<K> | undefined {
    if (this.depth >= this.maxDepth) {
      throw new ModelStateError(
        `Convention dispatch exceeded the maximum depth of ${this.maxDepth} while processing '${kind}'.`,
        ModelErrorCode.CONVENTION_DEPTH_EXCEEDED,
        { event: kind, maxConventionDepth: this.maxDepth }
      );
    }

    const context = new ConventionContext<EventResult<K>>(this, result);
    this.depth++;
    try {
      for (const convention of this.conventionSet.getConventions(kind)) {
        if (!isLive(args[0])) {
          break;
        }

        const handler = convention[HANDLER_NAMES[kind]];
        handler.apply(convention, [...args, context]);

        if (context.shouldStopProcessing()) {
          break;
        }
      }
    } finally {
      this.depth--;
    }

    const finalResult = context.result;
    return isLive(finalResult) ? finalResult : undefined;
  }
}
