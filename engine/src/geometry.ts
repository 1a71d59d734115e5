import type { GeoRect, GeoRing, LoadIssue, RegionName } from "./types.js";

export function bboxForRings(rings: readonly GeoRing[]): GeoRect {
  let minLon = Infinity;
  let minLat = Infinity;
  let maxLon = -Infinity;
  let maxLat = -Infinity;
  rings.forEach((ring) => {
    ring.forEach(([lon, lat]) => {
      if (lon < minLon) minLon = lon;
      if (lon > maxLon) maxLon = lon;
      if (lat < minLat) minLat = lat;
      if (lat > maxLat) maxLat = lat;
    });
  });
  return { minLon, maxLon, minLat, maxLat };
}

export function rectContainsPoint(rect: GeoRect, lon: number, lat: number): boolean {
  return lon >= rect.minLon && lon <= rect.maxLon && lat >= rect.minLat && lat <= rect.maxLat;
}

export function rectsIntersect(a: GeoRect, b: GeoRect): boolean {
  return !(a.maxLon < b.minLon || a.minLon > b.maxLon || a.maxLat < b.minLat || a.minLat > b.maxLat);
}

export function rectContainsRect(outer: GeoRect, inner: GeoRect): boolean {
  return (
    inner.minLon >= outer.minLon &&
    inner.maxLon <= outer.maxLon &&
    inner.minLat >= outer.minLat &&
    inner.maxLat <= outer.maxLat
  );
}

/** Zero-area, inverted or non-finite rectangles cover nothing. */
export function isDegenerateRect(rect: GeoRect): boolean {
  const { minLon, maxLon, minLat, maxLat } = rect;
  if (![minLon, maxLon, minLat, maxLat].every(Number.isFinite)) return true;
  return !(maxLon > minLon && maxLat > minLat);
}

export function expandRect(rect: GeoRect, by: number): GeoRect {
  return {
    minLon: rect.minLon - by,
    maxLon: rect.maxLon + by,
    minLat: rect.minLat - by,
    maxLat: rect.maxLat + by,
  };
}

/**
 * Even-odd ray casting against an implicitly closed ring. Edges whose endpoints
 * share a latitude never satisfy the straddle test, so zero-length and horizontal
 * edges are skipped before the division.
 */
export function pointInRing(lon: number, lat: number, ring: GeoRing): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    if (yi > lat !== yj > lat && lon < xi + ((xj - xi) * (lat - yi)) / (yj - yi)) {
      inside = !inside;
    }
  }
  return inside;
}

export interface SanitizedRings {
  rings: GeoRing[];
  issues: LoadIssue[];
}

/** Drop rings that cannot be drawn or hit-tested; the remaining rings keep their identity. */
export function sanitizeRings(region: RegionName, rings: readonly GeoRing[]): SanitizedRings {
  const kept: GeoRing[] = [];
  const issues: LoadIssue[] = [];
  rings.forEach((ring, ringIndex) => {
    if (ring.length < 3) {
      issues.push({ kind: "malformed-geometry", region, ringIndex, reason: "too-few-points" });
      return;
    }
    const finite = ring.every(([lon, lat]) => Number.isFinite(lon) && Number.isFinite(lat));
    if (!finite) {
      issues.push({ kind: "malformed-geometry", region, ringIndex, reason: "non-finite-coordinate" });
      return;
    }
    kept.push(ring);
  });
  return { rings: kept, issues };
}
