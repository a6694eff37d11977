/**
 * Why a piece of model state was set. Higher sources win when rules
 * compete for the same fact.
 */
export enum ConfigurationSource {
  Convention = 0,
  DataAnnotation = 1,
  Explicit = 2,
}

/**
 * True when `newSource` may replace a fact set at `oldSource`.
 * Equal sources override each other; an unset fact is always overridable.
 */
export function overrides(
  newSource: ConfigurationSource | undefined,
  oldSource: ConfigurationSource | undefined
): boolean {
  if (oldSource === undefined) {
    return true;
  }
  if (newSource === undefined) {
    return false;
  }
  return newSource >= oldSource;
}

export function overridesStrictly(
  newSource: ConfigurationSource | undefined,
  oldSource: ConfigurationSource | undefined
): boolean {
  return newSource !== undefined && (oldSource === undefined || newSource > oldSource);
}

export function max(
  left: ConfigurationSource | undefined,
  right: ConfigurationSource | undefined
): ConfigurationSource | undefined {
  if (left === undefined) {
    return right;
  }
  if (right === undefined) {
    return left;
  }
  return left >= right ? left : right;
}
