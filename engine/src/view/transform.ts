import type { MapConfig } from "../config.js";
import type { GeoPoint, GeoRect, ScreenPoint } from "../types.js";

export interface TransformState {
  zoom: number;
  panOffsetX: number;
  panOffsetY: number;
  viewportWidth: number;
  viewportHeight: number;
  minZoom: number;
  maxZoom: number;
}

export type TransformOptions = Pick<
  MapConfig,
  "viewportWidth" | "viewportHeight" | "initialZoom" | "initialPanX" | "initialPanY" | "minZoom" | "maxZoom"
>;

export function createTransform(options: TransformOptions): TransformState {
  return {
    zoom: options.initialZoom,
    panOffsetX: options.initialPanX,
    panOffsetY: options.initialPanY,
    viewportWidth: options.viewportWidth,
    viewportHeight: options.viewportHeight,
    minZoom: options.minZoom,
    maxZoom: options.maxZoom,
  };
}

/** Equirectangular plate carrée scaled to the viewport, then zoomed and panned. */
export function geoToScreen(lon: number, lat: number, state: TransformState): ScreenPoint {
  const x = ((lon + 180) / 360) * state.viewportWidth * state.zoom + state.panOffsetX;
  const y = ((-lat + 90) / 180) * state.viewportHeight * state.zoom + state.panOffsetY;
  return [x, y];
}

/** Integer pixel position for drawing; everything upstream stays in floating point. */
export function geoToPixel(lon: number, lat: number, state: TransformState): ScreenPoint {
  const [x, y] = geoToScreen(lon, lat, state);
  return [Math.trunc(x), Math.trunc(y)];
}

export function screenToGeo(x: number, y: number, state: TransformState): GeoPoint {
  const nx = (x - state.panOffsetX) / (state.viewportWidth * state.zoom);
  const ny = (y - state.panOffsetY) / (state.viewportHeight * state.zoom);
  return [nx * 360 - 180, 90 - ny * 180];
}

/** Non-finite offsets are ignored so the pan never becomes NaN. */
export function applyPan(state: TransformState, dx: number, dy: number): TransformState {
  if (!Number.isFinite(dx) || !Number.isFinite(dy)) return state;
  state.panOffsetX += dx;
  state.panOffsetY += dy;
  return state;
}

/**
 * Scale by `factor` keeping the geographic point under (anchorX, anchorY) fixed.
 * Returns false when the zoom is already saturated at a bound, or when the factor
 * or anchor is unusable (non-finite, or a factor <= 0); state is then untouched.
 */
export function applyZoomAt(state: TransformState, factor: number, anchorX: number, anchorY: number): boolean {
  if (!Number.isFinite(factor) || factor <= 0) return false;
  if (!Number.isFinite(anchorX) || !Number.isFinite(anchorY)) return false;
  const [lon, lat] = screenToGeo(anchorX, anchorY, state);
  const oldZoom = state.zoom;
  const newZoom = Math.max(state.minZoom, Math.min(state.maxZoom, oldZoom * factor));
  if (newZoom === oldZoom) return false;
  state.zoom = newZoom;
  const [nx, ny] = geoToScreen(lon, lat, state);
  state.panOffsetX += anchorX - nx;
  state.panOffsetY += anchorY - ny;
  return true;
}

export function resizeViewport(state: TransformState, width: number, height: number): TransformState {
  if (!(width > 0) || !(height > 0)) {
    throw new Error(`Viewport must have positive size, got ${width}x${height}`);
  }
  state.viewportWidth = width;
  state.viewportHeight = height;
  return state;
}

/** Geographic rectangle covered by the screen; compute once per frame. */
export function viewportBounds(state: TransformState): GeoRect {
  const [minLon, maxLat] = screenToGeo(0, 0, state);
  const [maxLon, minLat] = screenToGeo(state.viewportWidth, state.viewportHeight, state);
  return { minLon, maxLon, minLat, maxLat };
}
