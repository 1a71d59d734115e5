import { describe, expect, it } from "vitest";
import {
  applyPan,
  applyZoomAt,
  createTransform,
  geoToPixel,
  geoToScreen,
  resizeViewport,
  screenToGeo,
  viewportBounds,
  type TransformState,
} from "../src/view/transform.js";
import { DEFAULT_MAP_CONFIG } from "../src/config.js";

function transformAt(zoom: number, panX: number, panY: number): TransformState {
  const state = createTransform(DEFAULT_MAP_CONFIG);
  state.zoom = zoom;
  state.panOffsetX = panX;
  state.panOffsetY = panY;
  return state;
}

const states: TransformState[] = [
  transformAt(1, 0, 0),
  transformAt(0.3, 250, -40),
  transformAt(2.5, -1300, -700),
  transformAt(17, -20000, -9000),
  transformAt(50, -59000, -19500),
];

const screenSamples: [number, number][] = [
  [0, 0],
  [1199, 799],
  [600, 400],
  [37, 712],
  [1024, 3],
];

describe("geo <-> screen transform", () => {
  it("maps the world extent onto the viewport at zoom 1", () => {
    const state = transformAt(1, 0, 0);
    expect(geoToScreen(0, 0, state)).toEqual([600, 400]);
    expect(geoToScreen(-180, 90, state)).toEqual([0, 0]);
    expect(screenToGeo(600, 400, state)).toEqual([0, 0]);
    expect(viewportBounds(state)).toEqual({ minLon: -180, maxLon: 180, minLat: -90, maxLat: 90 });
  });

  it("truncates to whole pixels only for drawing", () => {
    const state = transformAt(1, 0, 0);
    const [x, y] = geoToScreen(0.2, 0.1, state);
    expect(x).toBeCloseTo(600.6667, 3);
    expect(y).toBeCloseTo(399.5556, 3);
    expect(geoToPixel(0.2, 0.1, state)).toEqual([600, 399]);
  });

  it("round-trips screen points within a pixel for every pan/zoom state", () => {
    states.forEach((state) => {
      screenSamples.forEach(([x, y]) => {
        const [lon, lat] = screenToGeo(x, y, state);
        const [bx, by] = geoToScreen(lon, lat, state);
        expect(Math.abs(bx - x)).toBeLessThan(1);
        expect(Math.abs(by - y)).toBeLessThan(1);
      });
    });
  });

  it("round-trips geographic points including ones outside the world extent", () => {
    const state = transformAt(3, -500, -200);
    [
      [12.5, 41.9],
      [-179.9, -89.9],
      [200, 95],
    ].forEach(([lon, lat]) => {
      const [x, y] = geoToScreen(lon, lat, state);
      const back = screenToGeo(x, y, state);
      expect(back[0]).toBeCloseTo(lon, 9);
      expect(back[1]).toBeCloseTo(lat, 9);
    });
  });
});

describe("pan and anchored zoom", () => {
  it("pans by screen pixels without clamping", () => {
    const state = transformAt(1, 0, 0);
    const before = geoToScreen(10, 5, state);
    applyPan(state, 10, -5);
    const after = geoToScreen(10, 5, state);
    expect(after[0]).toBeCloseTo(before[0] + 10);
    expect(after[1]).toBeCloseTo(before[1] - 5);

    applyPan(state, 100000, 100000);
    expect(state.panOffsetX).toBe(100010);
    expect(state.panOffsetY).toBe(99995);
  });

  it("keeps the geographic point under the anchor fixed", () => {
    const anchors: [number, number][] = [
      [300, 200],
      [0, 0],
      [1199, 799],
      [641, 17],
    ];
    [1.1, 2, 0.5, 1 / 1.1, 3.7].forEach((factor) => {
      anchors.forEach(([ax, ay]) => {
        const state = transformAt(2, -400, -150);
        const before = screenToGeo(ax, ay, state);
        expect(applyZoomAt(state, factor, ax, ay)).toBe(true);
        const after = screenToGeo(ax, ay, state);
        expect(Math.abs(after[0] - before[0])).toBeLessThan(1e-6);
        expect(Math.abs(after[1] - before[1])).toBeLessThan(1e-6);
      });
    });
  });

  it("leaves pan untouched when the zoom is saturated", () => {
    const state = transformAt(50, -123, -456);
    expect(applyZoomAt(state, 2, 300, 300)).toBe(false);
    expect(state.zoom).toBe(50);
    expect(state.panOffsetX).toBe(-123);
    expect(state.panOffsetY).toBe(-456);

    const low = transformAt(0.3, 10, 20);
    expect(applyZoomAt(low, 0.5, 0, 0)).toBe(false);
    expect(low.panOffsetX).toBe(10);
    expect(low.panOffsetY).toBe(20);
  });

  it("clamps to the bound and still anchors when a step overshoots it", () => {
    const state = transformAt(40, -30000, -10000);
    const before = screenToGeo(500, 500, state);
    expect(applyZoomAt(state, 2, 500, 500)).toBe(true);
    expect(state.zoom).toBe(50);
    const after = screenToGeo(500, 500, state);
    expect(Math.abs(after[0] - before[0])).toBeLessThan(1e-6);
    expect(Math.abs(after[1] - before[1])).toBeLessThan(1e-6);
  });

  it("ignores unusable zoom factors and anchors", () => {
    const state = transformAt(2, -400, -150);
    expect(applyZoomAt(state, NaN, 100, 100)).toBe(false);
    expect(applyZoomAt(state, Infinity, 100, 100)).toBe(false);
    expect(applyZoomAt(state, 0, 100, 100)).toBe(false);
    expect(applyZoomAt(state, -2, 100, 100)).toBe(false);
    expect(applyZoomAt(state, 1.5, NaN, 100)).toBe(false);
    expect(applyZoomAt(state, 1.5, 100, -Infinity)).toBe(false);
    expect(state.zoom).toBe(2);
    expect(state.panOffsetX).toBe(-400);
    expect(state.panOffsetY).toBe(-150);

    expect(applyZoomAt(state, 1.5, 100, 100)).toBe(true);
    expect(state.zoom).toBe(3);
  });

  it("ignores non-finite pan offsets", () => {
    const state = transformAt(1, 10, 20);
    applyPan(state, NaN, 5);
    applyPan(state, 5, Infinity);
    expect(state.panOffsetX).toBe(10);
    expect(state.panOffsetY).toBe(20);
  });

  it("rejects a non-positive viewport on resize", () => {
    const state = transformAt(1, 0, 0);
    resizeViewport(state, 800, 600);
    expect(viewportBounds(state)).toEqual({ minLon: -180, maxLon: 180, minLat: -90, maxLat: 90 });
    expect(() => resizeViewport(state, 0, 600)).toThrow("Viewport must have positive size");
  });
});
