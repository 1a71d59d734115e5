import {
  bboxForRings,
  expandRect,
  isDegenerateRect,
  rectContainsPoint,
  rectContainsRect,
  rectsIntersect,
} from "../geometry.js";
import type { SpatialIndex } from "../index/spatial.js";
import type { BoundedRegion } from "../regions/region.js";
import type { GeoRect, GeoRing } from "../types.js";
import type { LevelOfDetailSelector } from "./lod.js";

export interface ViewportCullerOptions {
  /** Fraction of the viewport width added on every edge. */
  marginFraction?: number;
  /** Slack in degrees kept around the last index query so small pans reuse it. */
  epsilon?: number;
  /** Rings with more points than this are also culled point by point. */
  pointCullMinPoints?: number;
}

export interface CulledRegion {
  region: BoundedRegion;
  rings: GeoRing[];
}

export function marginExpandedViewport(view: GeoRect, marginFraction: number): GeoRect {
  return expandRect(view, (view.maxLon - view.minLon) * marginFraction);
}

/**
 * Keep the points of a ring inside `rect` plus one neighbour either side of each
 * visible run, split into sub-rings at the gaps. Sub-rings under 3 points are dropped.
 * A ring with no vertex inside is kept whole when its box still overlaps `rect`,
 * since it may cover the view entirely.
 */
export function cullRing(ring: GeoRing, rect: GeoRect): GeoRing[] {
  const n = ring.length;
  if (n < 3) return [];
  const visible = ring.map(([lon, lat]) => rectContainsPoint(rect, lon, lat));
  if (!visible.includes(true)) {
    return rectsIntersect(bboxForRings([ring]), rect) ? [ring] : [];
  }
  const keep = visible.map((v, i) => v || visible[(i + n - 1) % n] || visible[(i + 1) % n]);
  const gap = keep.indexOf(false);
  if (gap === -1) return [ring];

  const out: GeoRing[] = [];
  let run: GeoRing = [];
  for (let step = 1; step <= n; step++) {
    const i = (gap + step) % n;
    if (keep[i]) {
      run.push(ring[i]);
      continue;
    }
    if (run.length >= 3) out.push(run);
    run = [];
  }
  if (run.length >= 3) out.push(run);
  return out;
}

/**
 * Region and point culling against the per-frame viewport. The index query is
 * widened by `epsilon` and reused while later viewports stay inside it; the
 * exact overlap test still runs every frame, so reuse never changes the result.
 */
export class ViewportCuller {
  private readonly marginFraction: number;
  private readonly epsilon: number;
  private readonly pointCullMinPoints: number;
  private lastQuery: GeoRect | null = null;
  private lastCandidates: BoundedRegion[] = [];
  private queryCount = 0;

  constructor(
    private readonly index: SpatialIndex,
    options: ViewportCullerOptions = {}
  ) {
    this.marginFraction = options.marginFraction ?? 0.1;
    this.epsilon = options.epsilon ?? 1;
    this.pointCullMinPoints = options.pointCullMinPoints ?? 200;
  }

  /** Number of spatial index queries issued so far. */
  get indexQueries(): number {
    return this.queryCount;
  }

  invalidate(): void {
    this.lastQuery = null;
    this.lastCandidates = [];
  }

  visibleRegions(view: GeoRect): BoundedRegion[] {
    if (isDegenerateRect(view)) return [];
    const expanded = marginExpandedViewport(view, this.marginFraction);
    if (!this.lastQuery || !rectContainsRect(this.lastQuery, expanded)) {
      this.lastQuery = expandRect(expanded, this.epsilon);
      this.lastCandidates = this.index.queryRect(this.lastQuery);
      this.queryCount += 1;
    }
    return this.lastCandidates.filter((region) => rectsIntersect(region.bbox, expanded));
  }

  cull(view: GeoRect, zoom: number, lod: LevelOfDetailSelector): CulledRegion[] {
    const regions = this.visibleRegions(view);
    if (regions.length === 0) return [];
    const expanded = marginExpandedViewport(view, this.marginFraction);
    const out: CulledRegion[] = [];
    regions.forEach((region) => {
      const rings: GeoRing[] = [];
      lod.ringsFor(region, zoom).forEach((ring) => {
        if (ring.length < 3) return;
        if (ring.length > this.pointCullMinPoints) rings.push(...cullRing(ring, expanded));
        else rings.push(ring);
      });
      if (rings.length > 0) out.push({ region, rings });
    });
    return out;
  }
}
