import { describe, expect, it } from "vitest";

import { MapView, createTransform, geoToScreen, resolveMapConfig } from "../src/index.js";

describe("package entry exports", () => {
  it("exposes the transform and the map view from the public entry", () => {
    const state = createTransform(resolveMapConfig({ viewportWidth: 360, viewportHeight: 180 }, {}));
    expect(geoToScreen(10, -5, state)).toEqual([190, 95]);
    expect(new MapView({ config: { viewportWidth: 360, viewportHeight: 180 }, logger: { warn: () => {}, info: () => {} } }).regions).toEqual([]);
  });
});
