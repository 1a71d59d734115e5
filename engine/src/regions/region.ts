import { bboxForRings, pointInRing, rectContainsPoint } from "../geometry.js";
import type { GeoRect, GeoRing, RGB, RegionName } from "../types.js";

export type RandomSource = () => number;

const SELECTED_BOOST = 50;

function randomChannel(random: RandomSource): number {
  return 100 + Math.floor(random() * 101);
}

/** Populations are whole and non-negative; anything non-finite counts as 0. */
export function wholePopulation(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}

export function randomBaseColor(random: RandomSource = Math.random): RGB {
  return [randomChannel(random), randomChannel(random), randomChannel(random)];
}

export interface BoundedRegionOptions {
  population?: number;
  color?: RGB;
  random?: RandomSource;
}

/**
 * A named set of exterior rings with a bounding box fixed at construction.
 * Rings must already be sanitized; see `sanitizeRings`.
 */
export class BoundedRegion {
  readonly name: RegionName;
  readonly rings: readonly GeoRing[];
  readonly bbox: Readonly<GeoRect>;
  readonly population: number;
  readonly baseColor: Readonly<RGB>;
  selected = false;

  constructor(name: RegionName, rings: readonly GeoRing[], options: BoundedRegionOptions = {}) {
    if (rings.length === 0) {
      throw new Error(`Region ${name} has no rings`);
    }
    this.name = name;
    this.rings = rings;
    this.bbox = Object.freeze(bboxForRings(rings));
    this.population = wholePopulation(options.population);
    this.baseColor = Object.freeze(options.color ?? randomBaseColor(options.random));
  }

  get pointCount(): number {
    return this.rings.reduce((sum, ring) => sum + ring.length, 0);
  }

  /** Union of rings: inside any ring means inside the region. Holes are not modelled. */
  containsPoint(lon: number, lat: number): boolean {
    if (!rectContainsPoint(this.bbox, lon, lat)) return false;
    return this.rings.some((ring) => pointInRing(lon, lat, ring));
  }

  color(selected: boolean = this.selected): RGB {
    const [r, g, b] = this.baseColor;
    if (!selected) return [r, g, b];
    return [Math.min(r + SELECTED_BOOST, 255), Math.min(g + SELECTED_BOOST, 255), Math.min(b + SELECTED_BOOST, 255)];
  }
}
