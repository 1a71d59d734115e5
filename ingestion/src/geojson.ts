import type { Feature, FeatureCollection, GeoJsonProperties, Geometry, Position } from "geojson";
import type { CityInput, GeoPoint, GeoRing, RegionInput } from "mapview-engine";

export type IngestIssue =
  | { kind: "unsupported-geometry"; featureIndex: number; name: string; geometryType: string | null }
  | { kind: "missing-population"; featureIndex: number; name: string }
  | { kind: "missing-owner"; featureIndex: number; name: string };

export interface RegionIngestOptions {
  /** Property names tried in order for the region name. */
  nameKeys?: string[];
  populationKeys?: string[];
}

export interface CityIngestOptions {
  nameKeys?: string[];
  populationKeys?: string[];
  /** Property names tried in order for the owning region's name. */
  ownerKeys?: string[];
}

export interface RegionIngestResult {
  regions: RegionInput[];
  issues: IngestIssue[];
}

export interface CityIngestResult {
  cities: CityInput[];
  issues: IngestIssue[];
}

export const DEFAULT_REGION_NAME_KEYS = ["NAME_EN", "ADMIN", "NAME", "name"];
export const DEFAULT_REGION_POPULATION_KEYS = ["POP_EST", "population"];
export const DEFAULT_CITY_NAME_KEYS = ["NAME", "name"];
export const DEFAULT_CITY_POPULATION_KEYS = ["POP_MAX", "population"];
export const DEFAULT_CITY_OWNER_KEYS = ["ADM0NAME", "SOV0NAME", "country"];

export function stringProperty(props: GeoJsonProperties, keys: string[]): string | undefined {
  if (!props) return undefined;
  for (const key of keys) {
    const value: unknown = props[key];
    if (typeof value === "string" && value.trim() !== "") return value;
  }
  return undefined;
}

export function numberProperty(props: GeoJsonProperties, keys: string[]): number | undefined {
  if (!props) return undefined;
  for (const key of keys) {
    const value: unknown = props[key];
    const num = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
    if (typeof num === "number" && Number.isFinite(num)) return num;
  }
  return undefined;
}

function toPoint(position: Position): GeoPoint {
  return [position[0], position[1]];
}

/** GeoJSON repeats the first position at the end; rings here are implicitly closed. */
export function toRing(positions: Position[]): GeoRing {
  const ring = positions.map(toPoint);
  if (ring.length > 1) {
    const first = ring[0];
    const last = ring[ring.length - 1];
    if (first[0] === last[0] && first[1] === last[1]) ring.pop();
  }
  return ring;
}

/** Exterior rings only: every polygon contributes its first ring, holes are dropped. */
export function exteriorRings(geometry: Geometry | null): GeoRing[] | null {
  if (!geometry) return null;
  if (geometry.type === "Polygon") {
    return geometry.coordinates.length > 0 ? [toRing(geometry.coordinates[0])] : [];
  }
  if (geometry.type === "MultiPolygon") {
    return geometry.coordinates.filter((poly) => poly.length > 0).map((poly) => toRing(poly[0]));
  }
  return null;
}

export function regionsFromFeatures(
  features: Feature<Geometry | null, GeoJsonProperties>[],
  options: RegionIngestOptions = {}
): RegionIngestResult {
  const nameKeys = options.nameKeys ?? DEFAULT_REGION_NAME_KEYS;
  const populationKeys = options.populationKeys ?? DEFAULT_REGION_POPULATION_KEYS;
  const regions: RegionInput[] = [];
  const issues: IngestIssue[] = [];
  features.forEach((f, featureIndex) => {
    const name = stringProperty(f.properties, nameKeys) ?? `Country_${featureIndex}`;
    const rings = exteriorRings(f.geometry);
    if (!rings) {
      issues.push({ kind: "unsupported-geometry", featureIndex, name, geometryType: f.geometry?.type ?? null });
      return;
    }
    const population = numberProperty(f.properties, populationKeys);
    const region: RegionInput = { name, rings };
    if (population !== undefined && population > 0) region.population = population;
    regions.push(region);
  });
  return { regions, issues };
}

export function regionsFromGeoJSON(
  collection: FeatureCollection<Geometry | null, GeoJsonProperties>,
  options?: RegionIngestOptions
): RegionIngestResult {
  return regionsFromFeatures(collection.features, options);
}

export function citiesFromGeoJSON(
  collection: FeatureCollection<Geometry | null, GeoJsonProperties>,
  options: CityIngestOptions = {}
): CityIngestResult {
  const nameKeys = options.nameKeys ?? DEFAULT_CITY_NAME_KEYS;
  const populationKeys = options.populationKeys ?? DEFAULT_CITY_POPULATION_KEYS;
  const ownerKeys = options.ownerKeys ?? DEFAULT_CITY_OWNER_KEYS;
  const cities: CityInput[] = [];
  const issues: IngestIssue[] = [];
  collection.features.forEach((f, featureIndex) => {
    const name = stringProperty(f.properties, nameKeys) ?? `City_${featureIndex}`;
    if (!f.geometry || f.geometry.type !== "Point") {
      issues.push({ kind: "unsupported-geometry", featureIndex, name, geometryType: f.geometry?.type ?? null });
      return;
    }
    const owner = stringProperty(f.properties, ownerKeys);
    if (owner === undefined) {
      issues.push({ kind: "missing-owner", featureIndex, name });
      return;
    }
    const population = numberProperty(f.properties, populationKeys);
    if (population === undefined) issues.push({ kind: "missing-population", featureIndex, name });
    const [lon, lat] = toPoint(f.geometry.coordinates);
    cities.push({ name, lon, lat, population: Math.max(0, Math.floor(population ?? 0)), owner });
  });
  return { cities, issues };
}
