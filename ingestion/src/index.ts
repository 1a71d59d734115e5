export { loadWorld } from "./api.js";
export type { BoundarySource, IngestedWorld, IngestionOptions, WorldSource } from "./api.js";
export {
  citiesFromGeoJSON,
  exteriorRings,
  numberProperty,
  stringProperty,
  regionsFromFeatures,
  regionsFromGeoJSON,
  toRing,
  DEFAULT_CITY_NAME_KEYS,
  DEFAULT_CITY_OWNER_KEYS,
  DEFAULT_CITY_POPULATION_KEYS,
  DEFAULT_REGION_NAME_KEYS,
  DEFAULT_REGION_POPULATION_KEYS,
} from "./geojson.js";
export type {
  CityIngestOptions,
  CityIngestResult,
  IngestIssue,
  RegionIngestOptions,
  RegionIngestResult,
} from "./geojson.js";
export { regionsFromTopoJSON, resolveObjectName, topologyFeatures } from "./topojson.js";
