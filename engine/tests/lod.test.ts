import { describe, expect, it } from "vitest";
import { LruCache } from "../src/cache.js";
import { BoundedRegion } from "../src/regions/region.js";
import type { GeoRing } from "../src/types.js";
import {
  LevelOfDetailSelector,
  decimateRing,
  selectDetail,
  selectStride,
  selectTolerance,
  simplifyRing,
} from "../src/view/lod.js";

// Square with a collinear midpoint on every side.
const notchedSquare: GeoRing = [
  [0, 0],
  [5, 0],
  [10, 0],
  [10, 5],
  [10, 10],
  [5, 10],
  [0, 10],
  [0, 5],
];

function wobblyRing(points: number): GeoRing {
  const ring: GeoRing = [];
  for (let i = 0; i < points; i++) {
    const theta = (i / points) * Math.PI * 2;
    const radius = 10 + 3 * Math.sin(5 * theta) + (i % 3) * 0.4;
    ring.push([radius * Math.cos(theta), radius * Math.sin(theta)]);
  }
  return ring;
}

function region(name: string, rings: GeoRing[]): BoundedRegion {
  return new BoundedRegion(name, rings, { color: [150, 150, 150] });
}

const zoomsFarther = [50, 4, 3, 2, 1.5, 1, 0.7, 0.5, 0.4, 0.3, 0.2];

describe("zoom bands", () => {
  it("maps zoom to a decimation stride", () => {
    expect(selectStride(50)).toBe(1);
    expect(selectStride(4)).toBe(1);
    expect(selectStride(3.99)).toBe(2);
    expect(selectStride(2)).toBe(2);
    expect(selectStride(1)).toBe(4);
    expect(selectStride(0.5)).toBe(8);
    expect(selectStride(0.49)).toBe(16);
  });

  it("maps zoom to a simplification tolerance", () => {
    expect(selectTolerance(4)).toBe(0);
    expect(selectTolerance(2)).toBe(0.1);
    expect(selectTolerance(1)).toBe(0.5);
    expect(selectTolerance(0.5)).toBe(1);
    expect(selectTolerance(0.3)).toBe(2);
    expect(selectTolerance(0.29)).toBe(5);
  });

  it("flags full detail", () => {
    expect(selectDetail(4, "stride")).toEqual({ strategy: "stride", parameter: 1, full: true });
    expect(selectDetail(1, "tolerance")).toEqual({ strategy: "tolerance", parameter: 0.5, full: false });
  });
});

describe("decimateRing", () => {
  const ten: GeoRing = Array.from({ length: 10 }, (_, i): [number, number] => [i, i % 2]);

  it("keeps every n-th point", () => {
    expect(decimateRing(ten, 4)).toEqual([ten[0], ten[4], ten[8]]);
    expect(decimateRing(ten, 1)).toBe(ten);
  });

  it("falls back to three evenly spaced points", () => {
    expect(decimateRing(ten, 8)).toEqual([ten[0], ten[3], ten[6]]);
    expect(decimateRing(ten, 16)).toEqual([ten[0], ten[3], ten[6]]);
  });
});

describe("simplifyRing", () => {
  it("drops collinear points", () => {
    expect(simplifyRing(notchedSquare, 0.1)).toEqual([
      [0, 0],
      [10, 0],
      [10, 10],
      [0, 10],
    ]);
  });

  it("never reduces a ring below three points", () => {
    expect(simplifyRing(notchedSquare, 100)).toEqual([
      [0, 0],
      [10, 0],
      [10, 10],
    ]);
  });

  it("returns the ring itself at zero tolerance", () => {
    expect(simplifyRing(notchedSquare, 0)).toBe(notchedSquare);
  });

  it("keeps a subset of the finer level's points as tolerance grows", () => {
    const ring = wobblyRing(120);
    const levels = [0.1, 0.5, 1, 2, 5].map((tol) => simplifyRing(ring, tol));
    for (let i = 1; i < levels.length; i++) {
      const finer = new Set(levels[i - 1]);
      expect(levels[i].length).toBeLessThanOrEqual(levels[i - 1].length);
      levels[i].forEach((point) => expect(finer.has(point)).toBe(true));
    }
    expect(levels[levels.length - 1].length).toBeGreaterThanOrEqual(3);
  });
});

describe("LevelOfDetailSelector", () => {
  it.each(["stride", "tolerance"] as const)("never adds points when zooming out (%s)", (strategy) => {
    const lod = new LevelOfDetailSelector({ strategy });
    const wobbly = region("Wobbly", [wobblyRing(200), wobblyRing(37)]);
    const counts = zoomsFarther.map((zoom) =>
      lod.ringsFor(wobbly, zoom).reduce((sum, ring) => sum + ring.length, 0)
    );
    for (let i = 1; i < counts.length; i++) {
      expect(counts[i]).toBeLessThanOrEqual(counts[i - 1]);
    }
    expect(counts[0]).toBe(237);
  });

  it("hands back the original rings at full detail", () => {
    const lod = new LevelOfDetailSelector({ strategy: "tolerance" });
    const square = region("Square", [notchedSquare]);
    expect(lod.ringsFor(square, 4)).toBe(square.rings);
    expect(lod.ringsFor(square, 40)).toBe(square.rings);
    expect(lod.cacheStats.size).toBe(0);
  });

  it("memoizes per region and detail level", () => {
    const lod = new LevelOfDetailSelector({ strategy: "tolerance" });
    const square = region("Square", [notchedSquare]);
    const first = lod.ringsFor(square, 2.5);
    const second = lod.ringsFor(square, 3);
    expect(second).toBe(first);
    expect(first).toEqual([
      [
        [0, 0],
        [10, 0],
        [10, 10],
        [0, 10],
      ],
    ]);
    expect(lod.cacheStats).toEqual({ hits: 1, misses: 1, size: 1 });

    lod.ringsFor(square, 1);
    expect(lod.cacheStats.size).toBe(2);
  });

  it("recomputes entries evicted from the bounded cache", () => {
    const lod = new LevelOfDetailSelector({ strategy: "stride", cacheSize: 2 });
    const a = region("A", [notchedSquare]);
    const b = region("B", [notchedSquare]);
    const c = region("C", [notchedSquare]);
    const firstA = lod.ringsFor(a, 1);
    lod.ringsFor(b, 1);
    lod.ringsFor(c, 1);
    expect(lod.cacheStats.size).toBe(2);
    const againA = lod.ringsFor(a, 1);
    expect(againA).not.toBe(firstA);
    expect(againA).toEqual(firstA);
  });
});

describe("LruCache", () => {
  it("evicts the least recently used entry", () => {
    const cache = new LruCache<{ v: number }>(2);
    cache.set("a", { v: 1 });
    cache.set("b", { v: 2 });
    expect(cache.get("a")).toEqual({ v: 1 });
    cache.set("c", { v: 3 });
    expect(cache.has("a")).toBe(true);
    expect(cache.has("b")).toBe(false);
    expect(cache.has("c")).toBe(true);
    expect(cache.get("b")).toBeUndefined();
    expect(cache.stats).toEqual({ hits: 1, misses: 1, size: 2 });
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new LruCache(0)).toThrow("LRU capacity must be a positive integer, got 0");
  });
});
