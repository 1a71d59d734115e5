import type { CityIndex } from "./cities/cityIndex.js";
import type { CityDrawInstruction, FrameOutput, RegionDrawInstruction, RegionName, ScreenRing } from "./types.js";
import type { LevelOfDetailSelector } from "./view/lod.js";
import type { ViewportCuller } from "./view/cull.js";
import { geoToPixel, viewportBounds, type TransformState } from "./view/transform.js";

/** Borders are stroked once the map is zoomed to at least the world-fit scale. */
export const OUTLINE_MIN_ZOOM = 1;

export interface FrameSources {
  transform: TransformState;
  culler: ViewportCuller;
  lod: LevelOfDetailSelector;
  cities: CityIndex;
  selectedRegionName: RegionName | null;
}

function onScreen(x: number, y: number, transform: TransformState): boolean {
  return x >= 0 && x <= transform.viewportWidth && y >= 0 && y <= transform.viewportHeight;
}

/**
 * Assemble draw instructions for one frame. The viewport is computed once here
 * and handed to the culler and the city index.
 */
export function buildFrame(sources: FrameSources): FrameOutput {
  const { transform, culler, lod, cities } = sources;
  const viewport = viewportBounds(transform);
  const zoom = transform.zoom;
  const outline = zoom >= OUTLINE_MIN_ZOOM;

  const regions: RegionDrawInstruction[] = [];
  culler.cull(viewport, zoom, lod).forEach(({ region, rings }) => {
    const screenRings: ScreenRing[] = rings
      .map((ring) => ring.map(([lon, lat]) => geoToPixel(lon, lat, transform)))
      .filter((ring) => ring.length >= 3);
    if (screenRings.length === 0) return;
    regions.push({ region: region.name, color: region.color(), rings: screenRings, outline });
  });

  const cityDraws: CityDrawInstruction[] = [];
  cities.visibleCities(viewport, zoom).forEach((city) => {
    const point = geoToPixel(city.lon, city.lat, transform);
    if (!onScreen(point[0], point[1], transform)) return;
    cityDraws.push({ city, point, label: city.name });
  });

  return {
    viewport,
    zoom,
    regions,
    cities: cityDraws,
    selectedRegionName: sources.selectedRegionName,
  };
}
