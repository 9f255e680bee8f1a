import { describe, expect, it, vi } from "vitest";

import { runBatch, runInBatches } from "./batch";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("runBatch", () => {
  it("returns results in task order", async () => {
    const results = await runBatch([
      async () => {
        await delay(5);
        return "slow";
      },
      async () => "fast",
    ]);
    expect(results).toEqual(["slow", "fast"]);
  });

  it("aborts siblings on the first failure and rethrows it once all have settled", async () => {
    const failure = new Error("lookup failed");
    let siblingSawAbort = false;
    let siblingSettled = false;

    const pending = runBatch([
      (signal) =>
        new Promise<string>((_resolve, reject) => {
          signal.addEventListener("abort", () => {
            siblingSawAbort = true;
            setTimeout(() => {
              siblingSettled = true;
              reject(new Error("cancelled"));
            }, 5);
          });
        }),
      async () => {
        await delay(1);
        throw failure;
      },
    ]);

    await expect(pending).rejects.toBe(failure);
    expect(siblingSawAbort).toBe(true);
    expect(siblingSettled).toBe(true);
  });

  it("forwards the parent signal to every task", async () => {
    const parent = new AbortController();
    const seen: AbortSignal[] = [];

    const pending = runBatch(
      [
        (signal) =>
          new Promise<number>((_resolve, reject) => {
            seen.push(signal);
            signal.addEventListener("abort", () => reject(signal.reason));
          }),
      ],
      parent.signal
    );
    const reason = new Error("deadline");
    parent.abort(reason);

    await expect(pending).rejects.toBe(reason);
    expect(seen[0]?.aborted).toBe(true);
  });
});

describe("runInBatches", () => {
  it("never has more than `size` workers in flight and finishes each batch before the next", async () => {
    const events: string[] = [];
    let inFlight = 0;
    let maxInFlight = 0;

    const results = await runInBatches([0, 1, 2, 3, 4, 5, 6], 3, async (item) => {
      events.push(`start:${item}`);
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(3 - (item % 3));
      inFlight -= 1;
      events.push(`end:${item}`);
      return item * 10;
    });

    expect(results).toEqual([0, 10, 20, 30, 40, 50, 60]);
    expect(maxInFlight).toBe(3);
    for (const [next, previous] of [
      [3, [0, 1, 2]],
      [6, [3, 4, 5]],
    ] as const) {
      for (const item of previous) {
        expect(events.indexOf(`end:${item}`)).toBeLessThan(events.indexOf(`start:${next}`));
      }
    }
  });

  it("reports each batch before starting it", async () => {
    const onBatch = vi.fn();
    await runInBatches(["a", "b", "c"], 2, async (item) => item, { onBatch });
    expect(onBatch.mock.calls).toEqual([
      [0, 2],
      [1, 1],
    ]);
  });

  it("does not start later batches after a failure", async () => {
    const worker = vi.fn(async (item: number) => {
      if (item === 1) {
        throw new Error(`item ${item} failed`);
      }
      return item;
    });

    await expect(runInBatches([0, 1, 2, 3, 4], 2, worker)).rejects.toThrow("item 1 failed");
    expect(worker.mock.calls.map(([item]) => item)).toEqual([0, 1]);
  });

  it("rejects a batch size that is not a positive integer", async () => {
    const worker = vi.fn(async (item: number) => item);
    await expect(runInBatches([1, 2], 0, worker)).rejects.toThrow("Batch size must be a positive integer, got 0");
    await expect(runInBatches([1, 2], 1.5, worker)).rejects.toThrow("Batch size must be a positive integer, got 1.5");
    expect(worker).not.toHaveBeenCalled();
  });

  it("returns an empty list for no items", async () => {
    const worker = vi.fn(async (item: number) => item);
    await expect(runInBatches([], 4, worker)).resolves.toEqual([]);
    expect(worker).not.toHaveBeenCalled();
  });
});
