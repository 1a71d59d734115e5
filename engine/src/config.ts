import type { CityPolicy, LodStrategy } from "./types.js";

export interface MapConfig {
  viewportWidth: number;
  viewportHeight: number;
  initialZoom: number;
  initialPanX: number;
  initialPanY: number;
  minZoom: number;
  maxZoom: number;
  zoomStep: number;
  panStep: number;
  lodStrategy: LodStrategy;
  cityPolicy: CityPolicy;
  /** Fraction of the viewport width added to every edge before culling. */
  cullMargin: number;
  /** Degrees an edge may move before the culler queries the index again. */
  viewportEpsilon: number;
  lodCacheSize: number;
  linearScanLimit: number;
  gridDepth: number;
  pointCullMinPoints: number;
  debug: boolean;
}

export const DEFAULT_MAP_CONFIG: Readonly<MapConfig> = {
  viewportWidth: 1200,
  viewportHeight: 800,
  initialZoom: 1,
  initialPanX: 0,
  initialPanY: 0,
  minZoom: 0.3,
  maxZoom: 50,
  zoomStep: 1.1,
  panStep: 20,
  lodStrategy: "tolerance",
  cityPolicy: "threshold",
  cullMargin: 0.1,
  viewportEpsilon: 1,
  lodCacheSize: 512,
  linearScanLimit: 256,
  gridDepth: 5,
  pointCullMinPoints: 200,
  debug: false,
};

export type EnvSource = Record<string, string | undefined>;

function processEnv(): EnvSource {
  return typeof process !== "undefined" ? process.env : {};
}

function parseNumber(env: EnvSource, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function parseLodStrategy(raw: string | undefined): LodStrategy | undefined {
  if (raw === undefined || raw === "") return undefined;
  if (raw === "stride" || raw === "tolerance") return raw;
  throw new Error(`MAPVIEW_LOD_STRATEGY must be "stride" or "tolerance", got "${raw}"`);
}

function parseCityPolicy(raw: string | undefined): CityPolicy | undefined {
  if (raw === undefined || raw === "") return undefined;
  if (raw === "threshold" || raw === "quota") return raw;
  throw new Error(`MAPVIEW_CITY_POLICY must be "threshold" or "quota", got "${raw}"`);
}

function configFromEnv(env: EnvSource): Partial<MapConfig> {
  const out: Partial<MapConfig> = {};
  if (env.MAPVIEW_DEBUG !== undefined) out.debug = env.MAPVIEW_DEBUG === "1";
  const lodStrategy = parseLodStrategy(env.MAPVIEW_LOD_STRATEGY);
  if (lodStrategy) out.lodStrategy = lodStrategy;
  const cityPolicy = parseCityPolicy(env.MAPVIEW_CITY_POLICY);
  if (cityPolicy) out.cityPolicy = cityPolicy;
  const minZoom = parseNumber(env, "MAPVIEW_MIN_ZOOM");
  if (minZoom !== undefined) out.minZoom = minZoom;
  const maxZoom = parseNumber(env, "MAPVIEW_MAX_ZOOM");
  if (maxZoom !== undefined) out.maxZoom = maxZoom;
  return out;
}

function validate(config: MapConfig): MapConfig {
  if (!(config.viewportWidth > 0) || !(config.viewportHeight > 0)) {
    throw new Error(`Viewport must have positive size, got ${config.viewportWidth}x${config.viewportHeight}`);
  }
  if (!(config.minZoom > 0) || !(config.maxZoom >= config.minZoom)) {
    throw new Error(`Invalid zoom bounds [${config.minZoom}, ${config.maxZoom}]`);
  }
  if (!(config.zoomStep > 1)) {
    throw new Error(`zoomStep must be greater than 1, got ${config.zoomStep}`);
  }
  if (!(config.cullMargin >= 0) || !(config.viewportEpsilon >= 0)) {
    throw new Error("cullMargin and viewportEpsilon must be non-negative");
  }
  if (!Number.isInteger(config.lodCacheSize) || config.lodCacheSize < 1) {
    throw new Error(`lodCacheSize must be a positive integer, got ${config.lodCacheSize}`);
  }
  if (!Number.isInteger(config.gridDepth) || config.gridDepth < 0 || config.gridDepth > 12) {
    throw new Error(`gridDepth must be an integer in [0, 12], got ${config.gridDepth}`);
  }
  return config;
}

/**
 * Layer explicit overrides over MAPVIEW_* environment variables over the defaults.
 */
export function resolveMapConfig(overrides: Partial<MapConfig> = {}, env: EnvSource = processEnv()): MapConfig {
  const merged: MapConfig = { ...DEFAULT_MAP_CONFIG, ...configFromEnv(env), ...overrides };
  merged.initialZoom = Math.min(merged.maxZoom, Math.max(merged.minZoom, merged.initialZoom));
  return validate(merged);
}
