import { jest } from "@jest/globals";
import type { IndexedElement } from "../../src/types.js";
import { indexTree, parseJsonSource } from "../../src/ui/tree.js";
import { waitForElement } from "../../src/ui/wait.js";
import { TODO_JSON_SOURCE } from "../helpers/sources.js";

const loaded = indexTree(parseJsonSource(TODO_JSON_SOURCE));
const loading = indexTree(parseJsonSource({ type: "XCUIElementTypeApplication", name: "Todo" }));

/** Virtual clock: each sleep advances time instead of waiting. */
function virtualTime() {
  let current = 0;
  return {
    now: () => current,
    sleep: jest.fn(async (ms: number) => {
      current += ms;
    }),
  };
}

describe("waitForElement", () => {
  it("returns as soon as the element appears", async () => {
    const clock = virtualTime();
    const screens = [loading, loading, loaded];
    const read = jest.fn(async (): Promise<IndexedElement[]> => screens.shift() ?? loaded);

    const result = await waitForElement(read, { label: "Walk dog", type: "Cell" }, {
      timeoutMs: 5000,
      pollIntervalMs: 250,
      ...clock,
    });

    expect(result.element.index).toBe(7);
    expect(result.attempts).toBe(3);
    expect(result.elapsedMs).toBe(500);
    expect(clock.sleep).toHaveBeenCalledTimes(2);
  });

  it("times out with the attempt count", async () => {
    const clock = virtualTime();
    const read = jest.fn(async () => loading);

    await expect(
      waitForElement(read, { label: "Walk dog" }, { timeoutMs: 1000, pollIntervalMs: 500, ...clock }),
    ).rejects.toMatchObject({
      kind: "Timeout",
      message: 'No element matched {"label":"Walk dog"} within 1000ms (3 attempts, 1 elements on the last screen)',
    });
  });

  it("fails immediately on an ambiguous predicate", async () => {
    const clock = virtualTime();
    const read = jest.fn(async () => loaded);

    await expect(waitForElement(read, { type: "Cell" }, clock)).rejects.toMatchObject({ kind: "InvalidArgument" });
    expect(read).toHaveBeenCalledTimes(1);
  });
});
