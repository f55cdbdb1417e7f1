/**
 * Purpose: Verify the in-flight batch limiter bounds concurrency and propagates failures.
 * Persists: None.
 * Security Risks: None.
 */

import { describe, expect, it } from "vitest";

import { createLimiter, unlimited } from "../src/limiter";

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("createLimiter", () => {
  it("limits concurrency", async () => {
    const limit = createLimiter(2);
    let active = 0;
    let maxActive = 0;

    const work = async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await delay(10);
      active -= 1;
    };

    await Promise.all(Array.from({ length: 8 }, () => limit(work)));
    expect(maxActive).toBe(2);
  });

  it("starts queued tasks in submission order", async () => {
    const limit = createLimiter(1);
    const started: number[] = [];

    await Promise.all(
      [1, 2, 3].map((id) =>
        limit(async () => {
          started.push(id);
          await delay(1);
        })
      )
    );

    expect(started).toEqual([1, 2, 3]);
  });

  it("rejects with the task error and keeps draining the queue", async () => {
    const limit = createLimiter(1);

    const failing = limit(async () => {
      throw new Error("boom");
    });
    const following = limit(async () => "done");

    await expect(failing).rejects.toThrow("boom");
    await expect(following).resolves.toBe("done");
  });

  it.each([0, -1, 1.5])("rejects concurrency %s", (value) => {
    expect(() => createLimiter(value)).toThrow("concurrency must be an integer >= 1");
  });
});

describe("unlimited", () => {
  it("runs the task immediately", async () => {
    let ran = false;
    const pending = unlimited(async () => {
      ran = true;
      return 7;
    });

    expect(ran).toBe(true);
    await expect(pending).resolves.toBe(7);
  });
});
