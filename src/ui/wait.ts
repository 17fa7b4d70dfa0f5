import type { IndexedElement } from "../types.js";
import { AutomationError, isAutomationError } from "../wda/errors.js";
import { describePredicate, findElement, type Predicate } from "./predicate.js";

export interface WaitOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface WaitResult {
  element: IndexedElement;
  elapsedMs: number;
  attempts: number;
}

export const DEFAULT_WAIT_TIMEOUT_MS = 10_000;
export const DEFAULT_POLL_INTERVAL_MS = 500;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Re-reads the tree until the predicate resolves to one element. Only
 * NoSuchElement keeps polling; an ambiguous or malformed predicate fails on
 * the first attempt.
 */
export async function waitForElement(
  readElements: () => Promise<IndexedElement[]>,
  predicate: Predicate,
  options: WaitOptions = {},
): Promise<WaitResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const now = options.now ?? Date.now;
  const pause = options.sleep ?? sleep;

  const start = now();
  let attempts = 0;
  let lastCount = 0;

  for (;;) {
    attempts += 1;
    const elements = await readElements();
    lastCount = elements.length;
    try {
      return { element: findElement(elements, predicate), elapsedMs: now() - start, attempts };
    } catch (error) {
      if (!isAutomationError(error, "NoSuchElement")) throw error;
    }

    if (now() - start + pollIntervalMs > timeoutMs) break;
    await pause(pollIntervalMs);
  }

  throw new AutomationError(
    "Timeout",
    `No element matched ${describePredicate(predicate)} within ${timeoutMs}ms ` +
      `(${attempts} attempts, ${lastCount} elements on the last screen)`,
  );
}
