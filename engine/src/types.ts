export type RegionName = string;

export type GeoPoint = [number, number]; // [lon, lat]
export type GeoRing = GeoPoint[];
export type ScreenPoint = [number, number]; // [x, y] pixels
export type ScreenRing = ScreenPoint[];
export type RGB = [number, number, number];

/** Axis-aligned box in degrees. Also used for the per-frame viewport. */
export interface GeoRect {
  minLon: number;
  maxLon: number;
  minLat: number;
  maxLat: number;
}

export interface RegionInput {
  name: RegionName;
  rings: GeoRing[];
  population?: number;
}

export interface CityInput {
  name: string;
  lon: number;
  lat: number;
  population: number;
  owner: RegionName; // foreign key into RegionInput.name
}

export interface City {
  name: string;
  lon: number;
  lat: number;
  population: number;
  owner: RegionName;
}

export type LodStrategy = "stride" | "tolerance";

export type CityPolicy = "threshold" | "quota";

export type LoadIssue =
  | {
      kind: "malformed-geometry";
      region: RegionName;
      ringIndex: number;
      reason: "too-few-points" | "non-finite-coordinate";
    }
  | { kind: "empty-region"; region: RegionName }
  | { kind: "duplicate-region"; region: RegionName }
  | { kind: "unresolved-owner"; city: string; owner: RegionName };

export interface LoadReport {
  regions: number;
  cities: number;
  issues: LoadIssue[];
}

export type MapLogger = Pick<Console, "warn" | "info">;

export interface RegionDrawInstruction {
  region: RegionName;
  color: RGB;
  rings: ScreenRing[];
  outline: boolean;
}

export interface CityDrawInstruction {
  city: City;
  point: ScreenPoint;
  label: string;
}

export interface FrameOutput {
  viewport: GeoRect;
  zoom: number;
  regions: RegionDrawInstruction[];
  cities: CityDrawInstruction[];
  selectedRegionName: RegionName | null;
}
