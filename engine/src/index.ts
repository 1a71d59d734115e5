/**
 * Map View Engine Core
 * --------------------
 * Flat-plane geometry for an interactive country map: transform, hit testing,
 * spatial index, level of detail, viewport culling and city visibility.
 */
export * from "./types.js";

export { DEFAULT_MAP_CONFIG, resolveMapConfig } from "./config.js";
export type { MapConfig, EnvSource } from "./config.js";

export {
  createTransform,
  geoToScreen,
  geoToPixel,
  screenToGeo,
  applyPan,
  applyZoomAt,
  resizeViewport,
  viewportBounds,
} from "./view/transform.js";
export type { TransformState, TransformOptions } from "./view/transform.js";

export {
  bboxForRings,
  rectContainsPoint,
  rectsIntersect,
  isDegenerateRect,
  expandRect,
  pointInRing,
  sanitizeRings,
} from "./geometry.js";

export { BoundedRegion, randomBaseColor, wholePopulation } from "./regions/region.js";
export type { BoundedRegionOptions, RandomSource } from "./regions/region.js";
export { buildRegions } from "./regions/load.js";
export { RegionSelection } from "./regions/selection.js";

export { SpatialIndex } from "./index/spatial.js";
export type { SpatialIndexOptions } from "./index/spatial.js";

export { LruCache } from "./cache.js";

export {
  FULL_DETAIL_ZOOM,
  selectStride,
  selectTolerance,
  selectDetail,
  decimateRing,
  simplifyRing,
  LevelOfDetailSelector,
} from "./view/lod.js";
export type { DetailLevel, LevelOfDetailOptions } from "./view/lod.js";

export { ViewportCuller, cullRing, marginExpandedViewport } from "./view/cull.js";
export type { CulledRegion, ViewportCullerOptions } from "./view/cull.js";

export { CityIndex, buildCities, populationFloor, quotaShare, regionQuota } from "./cities/cityIndex.js";
export type { CityIndexOptions } from "./cities/cityIndex.js";

export { buildFrame, OUTLINE_MIN_ZOOM } from "./frame.js";
export { MapView } from "./mapView.js";
export type { MapViewOptions } from "./mapView.js";
