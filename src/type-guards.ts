import { HANDLER_NAMES } from "./conventions/convention-events";
import type { ConventionEventKind, ConventionFor } from "./conventions/convention-events";

/**
 * Creates a type predicate that tests whether a convention reacts to an
 * event kind. Capabilities are plain methods, so the test is a method lookup.
 * @example
 *   const handlesAdded = (c: object) => implementsConvention(c, "entityTypeAdded");
 *   if (implementsConvention(convention, "foreignKeyAdded")) { // TS proves the handler exists }
 */
export function implementsConvention<K extends ConventionEventKind>(
  convention: object,
  kind: K
): convention is ConventionFor<K> {
  return typeof Reflect.get(convention, HANDLER_NAMES[kind]) === "function";
}

/**
 * Liveness of a dispatch subject or result.
 * Metadata objects and builders expose `isInModel`; anything else (names,
 * annotations) is always live.
 */
export function isLive(value: unknown): boolean {
  if (typeof value !== "object" || value === null) return true;
  if (!("isInModel" in value)) return true;
  return value.isInModel !== false;
}

/**
 * Assert a builder call was accepted or throw.
 * Useful in configuration code that expects its own explicit calls to win.
 */
export function assertAccepted<T>(value: T | undefined, label: string): asserts value is T {
  if (value === undefined) {
    throw new Error(`${label}: the model builder refused the configuration.`);
  }
}
