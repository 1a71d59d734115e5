import type { Feature, GeoJsonProperties, Geometry } from "geojson";
import { feature } from "topojson-client";
import type { Topology } from "topojson-specification";
import { regionsFromFeatures, type RegionIngestOptions, type RegionIngestResult } from "./geojson.js";

/** Pick the object holding country shapes: an explicit name, else the first key mentioning "countr", else the first. */
export function resolveObjectName(topology: Topology, objectName?: string): string {
  const keys = Object.keys(topology.objects);
  if (objectName !== undefined) {
    if (!topology.objects[objectName]) {
      throw new Error(`TopoJSON object ${objectName} not found (available: ${keys.join(", ")})`);
    }
    return objectName;
  }
  const found = keys.find((k) => k.toLowerCase().includes("countr")) ?? keys[0];
  if (found === undefined) throw new Error("TopoJSON topology has no objects");
  return found;
}

export function topologyFeatures(
  topology: Topology,
  objectName?: string
): Feature<Geometry | null, GeoJsonProperties>[] {
  const obj = topology.objects[resolveObjectName(topology, objectName)];
  const decoded = feature(topology, obj);
  return "features" in decoded ? decoded.features : [decoded];
}

export function regionsFromTopoJSON(
  topology: Topology,
  objectName?: string,
  options?: RegionIngestOptions
): RegionIngestResult {
  return regionsFromFeatures(topologyFeatures(topology, objectName), options);
}
