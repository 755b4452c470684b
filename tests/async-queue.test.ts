import { describe, expect, it } from "vitest";

import { AsyncQueue } from "../src/utils/async-queue.js";

async function drain<T>(queue: AsyncQueue<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of queue) out.push(item);
  return out;
}

describe("AsyncQueue", () => {
  it("yields buffered items then finishes after end()", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.end();
    queue.push(3);

    expect(await drain(queue)).toEqual([1, 2]);
  });

  it("wakes a waiting consumer", async () => {
    const queue = new AsyncQueue<string>();
    const result = drain(queue);

    queue.push("a");
    await Promise.resolve();
    queue.push("b");
    queue.end();

    expect(await result).toEqual(["a", "b"]);
  });

  it("discards the buffer on abort()", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.abort();

    expect(queue.size).toBe(0);
    expect(queue.isEnded).toBe(true);
    expect(await drain(queue)).toEqual([]);
  });

  it("unblocks a pending next() when aborted", async () => {
    const queue = new AsyncQueue<number>();
    const result = drain(queue);
    queue.abort();

    expect(await result).toEqual([]);
  });
});
