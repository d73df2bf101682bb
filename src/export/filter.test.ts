import { describe, it, expect } from "vitest";
import { excludeNeverFetched, isNeverFetched } from "./filter";
import { createTestSubscription } from "../test-utils/fixtures";

const created = new Date("2024-01-01T00:00:00Z");

describe("isNeverFetched", () => {
  it("should flag a subscription with no last-fetch time", () => {
    expect(isNeverFetched(createTestSubscription({ createdAt: created }))).toBe(true);
  });

  it("should flag a fetch at the exact creation instant", () => {
    const sub = createTestSubscription({
      createdAt: created,
      lastFetchedAt: new Date(created.getTime()),
    });

    expect(isNeverFetched(sub)).toBe(true);
  });

  it("should flag a fetch 59 seconds after creation", () => {
    const sub = createTestSubscription({
      createdAt: created,
      lastFetchedAt: new Date("2024-01-01T00:00:59Z"),
    });

    expect(isNeverFetched(sub)).toBe(true);
  });

  it("should keep a fetch exactly 60 seconds after creation", () => {
    const sub = createTestSubscription({
      createdAt: created,
      lastFetchedAt: new Date("2024-01-01T00:01:00Z"),
    });

    expect(isNeverFetched(sub)).toBe(false);
  });

  it("should use the absolute difference when the fetch precedes creation", () => {
    const sub = createTestSubscription({
      createdAt: created,
      lastFetchedAt: new Date("2023-12-31T23:59:30Z"),
    });

    expect(isNeverFetched(sub)).toBe(true);
  });

  it("should keep a fetched subscription with no creation time", () => {
    const sub = createTestSubscription({
      lastFetchedAt: new Date("2024-01-01T00:00:05Z"),
    });

    expect(isNeverFetched(sub)).toBe(false);
  });
});

describe("excludeNeverFetched", () => {
  const fetched = createTestSubscription({
    name: "Fetched",
    createdAt: created,
    lastFetchedAt: new Date("2024-02-01T00:00:00Z"),
  });
  const neverFetched = createTestSubscription({ name: "Never", createdAt: created });
  const sameInstant = createTestSubscription({
    name: "Same",
    createdAt: created,
    lastFetchedAt: created,
  });

  it("should keep fetched subscriptions in order and count the rest", () => {
    const result = excludeNeverFetched([neverFetched, fetched, sameInstant]);

    expect(result.subscriptions).toEqual([fetched]);
    expect(result.removedCount).toBe(2);
  });

  it("should be idempotent", () => {
    const once = excludeNeverFetched([fetched, neverFetched, sameInstant]);
    const twice = excludeNeverFetched(once.subscriptions);

    expect(twice.subscriptions).toEqual(once.subscriptions);
    expect(twice.removedCount).toBe(0);
  });

  it("should not mutate the input list", () => {
    const input = [neverFetched, fetched];

    excludeNeverFetched(input);

    expect(input).toEqual([neverFetched, fetched]);
  });

  it("should handle an empty list", () => {
    expect(excludeNeverFetched([])).toEqual({ subscriptions: [], removedCount: 0 });
  });
});
