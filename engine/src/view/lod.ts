import { LruCache } from "../cache.js";
import type { BoundedRegion } from "../regions/region.js";
import type { GeoPoint, GeoRing, LodStrategy } from "../types.js";

export const FULL_DETAIL_ZOOM = 4;

interface ZoomBand {
  minZoom: number;
  value: number;
}

// Ordered from closest to farthest; the first band whose minZoom is reached wins.
const STRIDE_BANDS: ZoomBand[] = [
  { minZoom: FULL_DETAIL_ZOOM, value: 1 },
  { minZoom: 2, value: 2 },
  { minZoom: 1, value: 4 },
  { minZoom: 0.5, value: 8 },
  { minZoom: -Infinity, value: 16 },
];

const TOLERANCE_BANDS: ZoomBand[] = [
  { minZoom: FULL_DETAIL_ZOOM, value: 0 },
  { minZoom: 2, value: 0.1 },
  { minZoom: 1, value: 0.5 },
  { minZoom: 0.5, value: 1.0 },
  { minZoom: 0.3, value: 2.0 },
  { minZoom: -Infinity, value: 5.0 },
];

function pickBand(bands: ZoomBand[], zoom: number): number {
  const band = bands.find((b) => zoom >= b.minZoom);
  return band ? band.value : bands[bands.length - 1].value;
}

export function selectStride(zoom: number): number {
  return pickBand(STRIDE_BANDS, zoom);
}

/** Simplification tolerance in degrees; 0 means full detail. */
export function selectTolerance(zoom: number): number {
  return pickBand(TOLERANCE_BANDS, zoom);
}

export interface DetailLevel {
  strategy: LodStrategy;
  /** Stride for "stride", tolerance in degrees for "tolerance". */
  parameter: number;
  full: boolean;
}

export function selectDetail(zoom: number, strategy: LodStrategy): DetailLevel {
  if (strategy === "stride") {
    const stride = selectStride(zoom);
    return { strategy, parameter: stride, full: stride === 1 };
  }
  const tolerance = selectTolerance(zoom);
  return { strategy, parameter: tolerance, full: tolerance === 0 };
}

function evenThirds(ring: GeoRing): GeoRing {
  const n = ring.length;
  return [ring[0], ring[Math.floor(n / 3)], ring[Math.floor((2 * n) / 3)]];
}

/** Keep points[0], points[s], points[2s], ...; never fewer than 3 points for a drawable ring. */
export function decimateRing(ring: GeoRing, stride: number): GeoRing {
  if (stride <= 1 || ring.length < 3) return ring;
  const out = ring.filter((_, i) => i % stride === 0);
  return out.length >= 3 ? out : evenThirds(ring);
}

function sqDistanceToLine(p: GeoPoint, a: GeoPoint, b: GeoPoint): number {
  const [sx, sy] = a;
  const dx = b[0] - sx;
  const dy = b[1] - sy;
  const lenSq = dx * dx + dy * dy || 1e-12;
  const t = ((p[0] - sx) * dx + (p[1] - sy) * dy) / lenSq;
  const ddx = p[0] - (sx + t * dx);
  const ddy = p[1] - (sy + t * dy);
  return ddx * ddx + ddy * ddy;
}

interface ChainMax {
  idx: number;
  sqDist: number;
}

// Indices run past the end of the ring to close it; `at` wraps them.
function farthestInChain(at: (i: number) => GeoPoint, start: number, end: number): ChainMax {
  let best: ChainMax = { idx: -1, sqDist: 0 };
  for (let i = start + 1; i < end; i++) {
    const d = sqDistanceToLine(at(i), at(start), at(end));
    if (best.idx === -1 || d > best.sqDist) best = { idx: i, sqDist: d };
  }
  return best;
}

/**
 * Douglas–Peucker on a closed ring. The ring is split at point 0 and the point
 * farthest from it, and each half is simplified as a polyline. Split choices do
 * not depend on the tolerance, so a smaller tolerance keeps a superset of points.
 */
export function simplifyRing(ring: GeoRing, tolerance: number): GeoRing {
  const n = ring.length;
  if (tolerance <= 0 || n <= 3) return ring;
  const at = (i: number): GeoPoint => ring[i % n];

  let far = 0;
  let farSq = 0;
  for (let i = 1; i < n; i++) {
    const dx = ring[i][0] - ring[0][0];
    const dy = ring[i][1] - ring[0][1];
    const d = dx * dx + dy * dy;
    if (d > farSq) {
      far = i;
      farSq = d;
    }
  }
  if (far === 0) return evenThirds(ring);

  const sqTol = tolerance * tolerance;
  const keep = new Array<boolean>(n).fill(false);
  keep[0] = keep[far] = true;
  const stack: [number, number][] = [
    [0, far],
    [far, n],
  ];
  let top = stack.pop();
  while (top) {
    const [start, end] = top;
    const { idx, sqDist } = farthestInChain(at, start, end);
    if (idx !== -1 && sqDist > sqTol) {
      keep[idx % n] = true;
      stack.push([start, idx], [idx, end]);
    }
    top = stack.pop();
  }

  let kept = keep.filter(Boolean).length;
  if (kept < 3) {
    const first = farthestInChain(at, 0, far);
    const second = farthestInChain(at, far, n);
    const pick = first.idx !== -1 && (second.idx === -1 || first.sqDist >= second.sqDist) ? first : second;
    keep[pick.idx % n] = true;
    kept += 1;
  }
  return ring.filter((_, i) => keep[i]);
}

export function applyDetail(ring: GeoRing, detail: DetailLevel): GeoRing {
  if (detail.full) return ring;
  return detail.strategy === "stride" ? decimateRing(ring, detail.parameter) : simplifyRing(ring, detail.parameter);
}

export interface LevelOfDetailOptions {
  strategy: LodStrategy;
  cacheSize?: number;
}

/**
 * Picks ring detail from zoom alone and memoizes reduced rings per
 * (region, strategy, parameter). Evicted entries are recomputed on demand.
 */
export class LevelOfDetailSelector {
  readonly strategy: LodStrategy;
  private readonly cache: LruCache<GeoRing[]>;

  constructor(options: LevelOfDetailOptions) {
    this.strategy = options.strategy;
    this.cache = new LruCache<GeoRing[]>(options.cacheSize ?? 512);
  }

  get cacheStats() {
    return this.cache.stats;
  }

  detailFor(zoom: number): DetailLevel {
    return selectDetail(zoom, this.strategy);
  }

  ringsFor(region: BoundedRegion, zoom: number): readonly GeoRing[] {
    const detail = this.detailFor(zoom);
    if (detail.full) return region.rings;
    const key = `${region.name}::${detail.strategy}:${detail.parameter}`;
    return this.cache.getOrCompute(key, () => region.rings.map((ring) => applyDetail(ring, detail)));
  }

  clear(): void {
    this.cache.clear();
  }
}
