import type { FeatureCollection, GeoJsonProperties, Geometry } from "geojson";
import type { Topology } from "topojson-specification";
import type { CityInput, RegionInput } from "mapview-engine";
import {
  citiesFromGeoJSON,
  regionsFromGeoJSON,
  type CityIngestOptions,
  type IngestIssue,
  type RegionIngestOptions,
} from "./geojson.js";
import { regionsFromTopoJSON } from "./topojson.js";

export type BoundarySource = Topology | FeatureCollection<Geometry | null, GeoJsonProperties>;

export interface WorldSource {
  boundaries: BoundarySource;
  /** TopoJSON object to decode; ignored for GeoJSON input. */
  objectName?: string;
  cities?: FeatureCollection<Geometry | null, GeoJsonProperties>;
}

export interface IngestionOptions {
  regions?: RegionIngestOptions;
  cities?: CityIngestOptions;
}

export interface IngestedWorld {
  regions: RegionInput[];
  cities: CityInput[];
  issues: IngestIssue[];
}

/**
 * Single entry point for already-decoded boundary and city data. No fetching or
 * reprojection happens here; coordinates must already be longitude/latitude.
 */
export function loadWorld(source: WorldSource, options: IngestionOptions = {}): IngestedWorld {
  const boundaries =
    source.boundaries.type === "Topology"
      ? regionsFromTopoJSON(source.boundaries, source.objectName, options.regions)
      : regionsFromGeoJSON(source.boundaries, options.regions);
  const cities = source.cities ? citiesFromGeoJSON(source.cities, options.cities) : { cities: [], issues: [] };
  return {
    regions: boundaries.regions,
    cities: cities.cities,
    issues: [...boundaries.issues, ...cities.issues],
  };
}
