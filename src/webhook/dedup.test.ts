import { describe, expect, test } from "vitest";
import { createDeduplicator } from "./dedup.ts";

function makeClock(start = 0) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("createDeduplicator", () => {
  test("flags a delivery id seen before", () => {
    const dedup = createDeduplicator();

    expect(dedup.isDuplicate("delivery-1")).toBe(false);
    expect(dedup.isDuplicate("delivery-1")).toBe(true);
    expect(dedup.isDuplicate("delivery-2")).toBe(false);
  });

  test("forgets a delivery once the window has passed", () => {
    const clock = makeClock(1_000);
    const dedup = createDeduplicator({ maxAgeMs: 5_000, now: clock.now });

    expect(dedup.isDuplicate("delivery-1")).toBe(false);

    clock.advance(5_000);
    expect(dedup.isDuplicate("delivery-1")).toBe(true);

    clock.advance(5_001);
    expect(dedup.isDuplicate("delivery-1")).toBe(false);
    expect(dedup.isDuplicate("delivery-1")).toBe(true);
  });

  test("evicts stale ids during periodic cleanup without losing fresh ones", () => {
    const clock = makeClock(0);
    const dedup = createDeduplicator({ maxAgeMs: 100, now: clock.now });

    dedup.isDuplicate("old");
    clock.advance(200);
    for (let i = 1; i < 1000; i++) {
      dedup.isDuplicate(`fresh-${i}`);
    }

    expect(dedup.isDuplicate("fresh-1")).toBe(true);
    expect(dedup.isDuplicate("old")).toBe(false);
  });
});
