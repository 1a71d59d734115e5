import { isDegenerateRect, rectContainsPoint, rectsIntersect } from "../geometry.js";
import type { GeoRect, MapLogger } from "../types.js";
import type { BoundedRegion } from "../regions/region.js";

export interface SpatialIndexOptions {
  /** Collections up to this size are scanned linearly. */
  linearScanLimit?: number;
  /** Grid depth: 2^depth columns and rows over the world extent. */
  depth?: number;
  debug?: boolean;
  logger?: MapLogger;
}

interface TileKey {
  x: number;
  y: number;
}

function tileId(key: TileKey): string {
  return `${key.x}/${key.y}`;
}

// Coordinates outside the world extent clamp into the edge tiles, so boxes and
// points out there still meet in the same tile.
function lonLatToTile(lon: number, lat: number, depth: number): TileKey {
  const scale = 1 << depth;
  const x = Math.min(scale - 1, Math.max(0, Math.floor(((lon + 180) / 360) * scale)));
  const y = Math.min(scale - 1, Math.max(0, Math.floor(((lat + 90) / 180) * scale)));
  return { x, y };
}

function tileRangeForRect(rect: GeoRect, depth: number) {
  const min = lonLatToTile(rect.minLon, rect.minLat, depth);
  const max = lonLatToTile(rect.maxLon, rect.maxLat, depth);
  return { min, max };
}

/**
 * Bounding-box index over regions. Entries are region positions in the source
 * collection, so every query returns regions in insertion order.
 */
export class SpatialIndex {
  private source: readonly BoundedRegion[] = [];
  private indexedCount = 0;
  private tiles: Map<string, number[]> | null = null;
  private readonly linearScanLimit: number;
  private readonly depth: number;
  private readonly debug: boolean;
  private readonly logger: MapLogger;

  constructor(options: SpatialIndexOptions = {}) {
    this.linearScanLimit = options.linearScanLimit ?? 256;
    this.depth = options.depth ?? 5;
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? console;
  }

  static build(regions: readonly BoundedRegion[], options?: SpatialIndexOptions): SpatialIndex {
    const index = new SpatialIndex(options);
    index.build(regions);
    return index;
  }

  get size(): number {
    return this.indexedCount;
  }

  get usesGrid(): boolean {
    return this.tiles !== null;
  }

  build(regions: readonly BoundedRegion[]): void {
    this.source = regions;
    this.indexedCount = regions.length;
    if (regions.length <= this.linearScanLimit) {
      this.tiles = null;
      return;
    }
    const tiles = new Map<string, number[]>();
    regions.forEach((region, idx) => {
      const { min, max } = tileRangeForRect(region.bbox, this.depth);
      for (let x = min.x; x <= max.x; x++) {
        for (let y = min.y; y <= max.y; y++) {
          const id = tileId({ x, y });
          const entry = tiles.get(id);
          if (entry) entry.push(idx);
          else tiles.set(id, [idx]);
        }
      }
    });
    this.tiles = tiles;
  }

  queryPoint(lon: number, lat: number): BoundedRegion | null {
    if (!Number.isFinite(lon) || !Number.isFinite(lat)) return null;
    this.ensureInSync();
    for (const idx of this.pointCandidates(lon, lat)) {
      const region = this.source[idx];
      if (rectContainsPoint(region.bbox, lon, lat) && region.containsPoint(lon, lat)) return region;
    }
    return null;
  }

  queryRect(rect: GeoRect): BoundedRegion[] {
    if (isDegenerateRect(rect)) return [];
    this.ensureInSync();
    return this.rectCandidates(rect)
      .map((idx) => this.source[idx])
      .filter((region) => rectsIntersect(region.bbox, rect));
  }

  private pointCandidates(lon: number, lat: number): number[] {
    if (!this.tiles) return this.source.map((_, idx) => idx);
    return this.tiles.get(tileId(lonLatToTile(lon, lat, this.depth))) ?? [];
  }

  private rectCandidates(rect: GeoRect): number[] {
    const tiles = this.tiles;
    if (!tiles) return this.source.map((_, idx) => idx);
    const found = new Set<number>();
    const { min, max } = tileRangeForRect(rect, this.depth);
    for (let x = min.x; x <= max.x; x++) {
      for (let y = min.y; y <= max.y; y++) {
        tiles.get(tileId({ x, y }))?.forEach((idx) => found.add(idx));
      }
    }
    return Array.from(found).sort((a, b) => a - b);
  }

  private ensureInSync(): void {
    if (this.source.length === this.indexedCount) return;
    const message = `Spatial index out of sync: built over ${this.indexedCount} regions, collection now holds ${this.source.length}`;
    if (this.debug) throw new Error(message);
    this.logger.warn(`${message}; rebuilding`);
    this.build(this.source);
  }
}
