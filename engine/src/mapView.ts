import { buildCities, CityIndex } from "./cities/cityIndex.js";
import { resolveMapConfig, type MapConfig } from "./config.js";
import { buildFrame } from "./frame.js";
import { SpatialIndex } from "./index/spatial.js";
import { buildRegions } from "./regions/load.js";
import type { BoundedRegion, RandomSource } from "./regions/region.js";
import { RegionSelection } from "./regions/selection.js";
import type {
  City,
  CityInput,
  FrameOutput,
  GeoPoint,
  LoadIssue,
  LoadReport,
  MapLogger,
  RegionInput,
  RegionName,
  ScreenPoint,
} from "./types.js";
import { ViewportCuller } from "./view/cull.js";
import { LevelOfDetailSelector } from "./view/lod.js";
import {
  applyPan,
  applyZoomAt,
  createTransform,
  geoToScreen,
  resizeViewport,
  screenToGeo,
  viewportBounds,
  type TransformState,
} from "./view/transform.js";

export interface MapViewOptions {
  config?: Partial<MapConfig>;
  logger?: MapLogger;
  /** Source for region base colors; defaults to Math.random. */
  random?: RandomSource;
}

function describeIssue(issue: LoadIssue): string {
  switch (issue.kind) {
    case "malformed-geometry":
      return `skipped ring ${issue.ringIndex} of ${issue.region} (${issue.reason})`;
    case "empty-region":
      return `skipped region ${issue.region}: no drawable rings`;
    case "duplicate-region":
      return `skipped repeated region name ${issue.region}`;
    case "unresolved-owner":
      return `city ${issue.city} references unknown region ${issue.owner}`;
  }
}

/**
 * The map core for one window: transform, loaded geometry and the indexes over
 * it. Input handling drives `pan`/`zoomAt`/`selectAt`; the renderer pulls `frame()`.
 */
export class MapView {
  readonly config: MapConfig;
  readonly transform: TransformState;
  private readonly logger: MapLogger;
  private readonly random?: RandomSource;
  private readonly selection = new RegionSelection();
  private readonly lod: LevelOfDetailSelector;
  private regionList: BoundedRegion[] = [];
  private regionsByName = new Map<RegionName, BoundedRegion>();
  private index: SpatialIndex;
  private culler: ViewportCuller;
  private cityIndex: CityIndex;

  constructor(options: MapViewOptions = {}) {
    this.config = resolveMapConfig(options.config);
    this.logger = options.logger ?? console;
    this.random = options.random;
    this.transform = createTransform(this.config);
    this.lod = new LevelOfDetailSelector({ strategy: this.config.lodStrategy, cacheSize: this.config.lodCacheSize });
    this.index = this.createIndex([]);
    this.culler = this.createCuller();
    this.cityIndex = new CityIndex([], { policy: this.config.cityPolicy, regionPopulations: new Map() });
  }

  get regions(): readonly BoundedRegion[] {
    return this.regionList;
  }

  get cities(): CityIndex {
    return this.cityIndex;
  }

  get selectedRegionName(): RegionName | null {
    return this.selection.selectedName;
  }

  region(name: RegionName): BoundedRegion | undefined {
    return this.regionsByName.get(name);
  }

  /** Replace the whole dataset. Selection and memoized detail levels are dropped. */
  load(regionInputs: readonly RegionInput[], cityInputs: readonly CityInput[] = []): LoadReport {
    this.selection.clear();
    this.lod.clear();

    const built = buildRegions(regionInputs, this.random);
    this.regionList = built.regions;
    this.regionsByName = new Map(built.regions.map((r) => [r.name, r]));
    this.index = this.createIndex(this.regionList);
    this.culler = this.createCuller();

    const cityLoad = buildCities(cityInputs, new Set(this.regionsByName.keys()));
    const populations = new Map(built.regions.map((r) => [r.name, r.population]));
    this.cityIndex = new CityIndex(cityLoad.cities, { policy: this.config.cityPolicy, regionPopulations: populations });

    const issues = [...built.issues, ...cityLoad.issues];
    issues.forEach((issue) => this.logger.warn(`[mapview] ${describeIssue(issue)}`));
    this.logger.info(
      `[mapview] loaded ${this.regionList.length} regions and ${this.cityIndex.size} cities (${issues.length} issues)`
    );
    return { regions: this.regionList.length, cities: this.cityIndex.size, issues };
  }

  geoToScreen(lon: number, lat: number): ScreenPoint {
    return geoToScreen(lon, lat, this.transform);
  }

  screenToGeo(x: number, y: number): GeoPoint {
    return screenToGeo(x, y, this.transform);
  }

  pan(dx: number, dy: number): void {
    applyPan(this.transform, dx, dy);
  }

  /** Keyboard-style pan by whole configured steps, e.g. `nudge(-1, 0)` for one step left. */
  nudge(stepsX: number, stepsY: number): void {
    this.pan(stepsX * this.config.panStep, stepsY * this.config.panStep);
  }

  zoomAt(factor: number, anchorX: number, anchorY: number): boolean {
    return applyZoomAt(this.transform, factor, anchorX, anchorY);
  }

  zoomIn(anchorX = this.transform.viewportWidth / 2, anchorY = this.transform.viewportHeight / 2): boolean {
    return this.zoomAt(this.config.zoomStep, anchorX, anchorY);
  }

  zoomOut(anchorX = this.transform.viewportWidth / 2, anchorY = this.transform.viewportHeight / 2): boolean {
    return this.zoomAt(1 / this.config.zoomStep, anchorX, anchorY);
  }

  resize(width: number, height: number): void {
    resizeViewport(this.transform, width, height);
  }

  regionAt(lon: number, lat: number): BoundedRegion | null {
    return this.index.queryPoint(lon, lat);
  }

  /** Select whatever region lies under a screen pixel; clicking open water clears the selection. */
  selectAt(x: number, y: number): BoundedRegion | null {
    const [lon, lat] = this.screenToGeo(x, y);
    const hit = this.regionAt(lon, lat);
    this.selection.select(hit);
    return hit;
  }

  selectByName(name: RegionName | null): BoundedRegion | null {
    const region = name === null ? null : this.regionsByName.get(name) ?? null;
    this.selection.select(region);
    return region;
  }

  visibleRegions(): BoundedRegion[] {
    return this.culler.visibleRegions(viewportBounds(this.transform));
  }

  visibleCities(): City[] {
    return this.cityIndex.visibleCities(viewportBounds(this.transform), this.transform.zoom);
  }

  frame(): FrameOutput {
    return buildFrame({
      transform: this.transform,
      culler: this.culler,
      lod: this.lod,
      cities: this.cityIndex,
      selectedRegionName: this.selection.selectedName,
    });
  }

  private createIndex(regions: readonly BoundedRegion[]): SpatialIndex {
    return SpatialIndex.build(regions, {
      linearScanLimit: this.config.linearScanLimit,
      depth: this.config.gridDepth,
      debug: this.config.debug,
      logger: this.logger,
    });
  }

  private createCuller(): ViewportCuller {
    return new ViewportCuller(this.index, {
      marginFraction: this.config.cullMargin,
      epsilon: this.config.viewportEpsilon,
      pointCullMinPoints: this.config.pointCullMinPoints,
    });
  }
}
