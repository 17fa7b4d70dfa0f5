import type { IndexedElement } from "../types.js";
import { AutomationError } from "../wda/errors.js";

/** A bare string means an exact, case-sensitive match. */
export type MatchRule =
  | string
  | { exact: string }
  | { contains: string }
  | { startsWith: string };

export type TextField = "type" | "label" | "value" | "identifier" | "text";

export const TEXT_FIELDS: readonly TextField[] = ["type", "label", "value", "identifier", "text"];

export interface Predicate {
  type?: MatchRule;
  label?: MatchRule;
  value?: MatchRule;
  identifier?: MatchRule;
  text?: MatchRule;
  enabled?: boolean;
  visible?: boolean;
  /** Selects the nth (0-based) match instead of requiring a unique one. */
  index?: number;
}

export function matchesRule(actual: string | undefined, rule: MatchRule): boolean {
  if (actual === undefined) return false;
  if (typeof rule === "string") return actual === rule;
  if ("exact" in rule) return actual === rule.exact;
  if ("contains" in rule) return actual.toLowerCase().includes(rule.contains.toLowerCase());
  return actual.toLowerCase().startsWith(rule.startsWith.toLowerCase());
}

export function hasConstraints(predicate: Predicate): boolean {
  return (
    TEXT_FIELDS.some((field) => predicate[field] !== undefined) ||
    predicate.enabled !== undefined ||
    predicate.visible !== undefined
  );
}

/** All elements satisfying every field present in the predicate, in index order. */
export function findElements(elements: IndexedElement[], predicate: Predicate): IndexedElement[] {
  return elements.filter((element) => {
    for (const field of TEXT_FIELDS) {
      const rule = predicate[field];
      if (rule !== undefined && !matchesRule(element[field], rule)) return false;
    }
    if (predicate.enabled !== undefined && element.enabled !== predicate.enabled) return false;
    if (predicate.visible !== undefined && element.visible !== predicate.visible) return false;
    return true;
  });
}

export function describePredicate(predicate: Predicate): string {
  return JSON.stringify(predicate);
}

/**
 * Resolves a predicate to exactly one element. With `index` the nth match is
 * returned, so `{ index: 5 }` alone picks element 5 of the traversal; without it more than one match is rejected rather than guessing,
 * so an ambiguous query never taps the wrong element.
 */
export function findElement(elements: IndexedElement[], predicate: Predicate): IndexedElement {
  if (!hasConstraints(predicate) && predicate.index === undefined) {
    throw new AutomationError("InvalidArgument", "Predicate needs at least one field to match on, or an index");
  }
  if (predicate.index !== undefined && (!Number.isInteger(predicate.index) || predicate.index < 0)) {
    throw new AutomationError(
      "InvalidArgument",
      `Predicate index must be a non-negative integer, got ${predicate.index}`,
    );
  }

  const matches = findElements(elements, predicate);
  const query = describePredicate(predicate);

  if (predicate.index !== undefined) {
    const match = matches[predicate.index];
    if (!match) {
      throw new AutomationError(
        "NoSuchElement",
        `Match ${predicate.index} requested but only ${matches.length} element(s) match ${query}`,
      );
    }
    return match;
  }

  if (matches.length === 0) {
    throw new AutomationError(
      "NoSuchElement",
      `No element matches ${query} (${elements.length} elements on screen)`,
    );
  }
  if (matches.length > 1) {
    const candidates = matches.map((element) => element.index).join(", ");
    throw new AutomationError(
      "InvalidArgument",
      `${matches.length} elements match ${query} (indices ${candidates}); add an index or narrow the predicate`,
    );
  }
  return matches[0];
}
