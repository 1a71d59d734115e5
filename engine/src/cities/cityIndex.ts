import { isDegenerateRect, rectContainsPoint } from "../geometry.js";
import { wholePopulation } from "../regions/region.js";
import type { City, CityInput, CityPolicy, GeoRect, LoadIssue, RegionName } from "../types.js";

interface Step {
  from: number;
  value: number;
}

// Viewport width in degrees (strictly above `from`) -> minimum population shown.
const POPULATION_FLOORS: Step[] = [
  { from: 180, value: 5_000_000 },
  { from: 60, value: 2_000_000 },
  { from: 20, value: 1_000_000 },
  { from: 5, value: 500_000 },
];
const LOCAL_FLOOR = 100_000;

// Zoom (at or above `from`) -> share of a region's quota shown.
const QUOTA_SHARES: Step[] = [
  { from: 4, value: 1.0 },
  { from: 2, value: 0.85 },
  { from: 1, value: 0.7 },
  { from: 0.5, value: 0.5 },
];
const FAR_SHARE = 0.3;

export function populationFloor(viewportWidthDeg: number): number {
  return POPULATION_FLOORS.find((s) => viewportWidthDeg > s.from)?.value ?? LOCAL_FLOOR;
}

export function quotaShare(zoom: number): number {
  return QUOTA_SHARES.find((s) => zoom >= s.from)?.value ?? FAR_SHARE;
}

/** Cities a region may show at full zoom: its population in millions, at least 3. */
export function regionQuota(regionPopulation: number): number {
  return Math.max(3, Math.floor(regionPopulation / 1_000_000));
}

export interface CityIndexOptions {
  policy: CityPolicy;
  /** Population per loaded region. Cities whose owner is missing here never pass the quota policy. */
  regionPopulations: ReadonlyMap<RegionName, number>;
}

export interface CityLoadResult {
  cities: City[];
  issues: LoadIssue[];
}

export function buildCities(inputs: readonly CityInput[], knownRegions: ReadonlySet<RegionName>): CityLoadResult {
  const issues: LoadIssue[] = [];
  const cities = inputs.map((input) => {
    if (!knownRegions.has(input.owner)) {
      issues.push({ kind: "unresolved-owner", city: input.name, owner: input.owner });
    }
    return {
      name: input.name,
      lon: input.lon,
      lat: input.lat,
      population: wholePopulation(input.population),
      owner: input.owner,
    };
  });
  return { cities, issues };
}

/**
 * Point features grouped by owning region, each group ordered by population
 * descending (ties keep load order). The visibility policy is fixed per index.
 */
export class CityIndex {
  readonly policy: CityPolicy;
  private readonly all: City[];
  private readonly byRegion = new Map<RegionName, City[]>();
  private readonly regionPopulations: ReadonlyMap<RegionName, number>;

  constructor(cities: readonly City[], options: CityIndexOptions) {
    this.policy = options.policy;
    this.regionPopulations = options.regionPopulations;
    this.all = cities.filter((c) => Number.isFinite(c.lon) && Number.isFinite(c.lat));
    this.all.forEach((city) => {
      const group = this.byRegion.get(city.owner);
      if (group) group.push(city);
      else this.byRegion.set(city.owner, [city]);
    });
    // Array.prototype.sort is stable.
    this.byRegion.forEach((group) => group.sort((a, b) => b.population - a.population));
  }

  get size(): number {
    return this.all.length;
  }

  citiesOf(region: RegionName): readonly City[] {
    return this.byRegion.get(region) ?? [];
  }

  visibleCities(view: GeoRect, zoom: number): City[] {
    if (isDegenerateRect(view)) return [];
    return this.policy === "quota" ? this.byQuota(view, zoom) : this.byThreshold(view);
  }

  private byThreshold(view: GeoRect): City[] {
    const floor = populationFloor(view.maxLon - view.minLon);
    return this.all.filter(
      (city) => city.population >= floor && rectContainsPoint(view, city.lon, city.lat)
    );
  }

  private byQuota(view: GeoRect, zoom: number): City[] {
    const share = quotaShare(zoom);
    const out: City[] = [];
    this.byRegion.forEach((group, region) => {
      const population = this.regionPopulations.get(region);
      if (population === undefined) return;
      const count = Math.ceil(regionQuota(population) * share);
      group.slice(0, count).forEach((city) => {
        if (rectContainsPoint(view, city.lon, city.lat)) out.push(city);
      });
    });
    return out;
  }
}
