import { describe, expect, test } from "vitest";
import { EndpointSelector } from "../../src/core/relay/endpoint-selector";
import { seededRandom } from "../helpers/fakes";

describe("EndpointSelector", () => {
  const pool = ["https://hooks.example/a", "https://hooks.example/b", "https://hooks.example/c"];

  test("maps the random value onto an index", () => {
    expect(new EndpointSelector(() => 0).select(pool)).toBe("https://hooks.example/a");
    expect(new EndpointSelector(() => 0.34).select(pool)).toBe("https://hooks.example/b");
    expect(new EndpointSelector(() => 0.99).select(pool)).toBe("https://hooks.example/c");
  });

  test("never indexes past the end of the pool", () => {
    const selector = new EndpointSelector(() => 1);
    expect(selector.select(pool)).toBe("https://hooks.example/c");
  });

  test("returns the only endpoint of a single-entry pool", () => {
    const selector = new EndpointSelector(seededRandom(7));
    for (let i = 0; i < 10; i++) {
      expect(selector.select(["https://hooks.example/only"])).toBe("https://hooks.example/only");
    }
  });

  test("returns undefined for an empty pool", () => {
    expect(new EndpointSelector().select([])).toBeUndefined();
  });

  test("is reproducible with a seeded source", () => {
    const first = new EndpointSelector(seededRandom(42));
    const second = new EndpointSelector(seededRandom(42));

    const a = Array.from({ length: 20 }, () => first.select(pool));
    const b = Array.from({ length: 20 }, () => second.select(pool));

    expect(a).toEqual(b);
  });

  test("spreads selections uniformly across the pool", () => {
    const selector = new EndpointSelector(seededRandom(2024));
    const trials = 30_000;
    const counts = new Map<string, number>();

    for (let i = 0; i < trials; i++) {
      const endpoint = selector.select(pool);
      if (endpoint !== undefined) {
        counts.set(endpoint, (counts.get(endpoint) ?? 0) + 1);
      }
    }

    expect(counts.size).toBe(pool.length);
    for (const endpoint of pool) {
      const frequency = (counts.get(endpoint) ?? 0) / trials;
      expect(Math.abs(frequency - 1 / pool.length)).toBeLessThan(0.02);
    }
  });

  test("uses Math.random by default", () => {
    const selector = new EndpointSelector();
    expect(pool).toContain(selector.select(pool));
  });
});
