import { sanitizeRings } from "../geometry.js";
import type { LoadIssue, RegionInput } from "../types.js";
import { BoundedRegion, type RandomSource } from "./region.js";

export interface BuildRegionsResult {
  regions: BoundedRegion[];
  issues: LoadIssue[];
}

/**
 * Validate loader output into regions. Bad rings are skipped, regions left with
 * nothing drawable and repeated names are skipped; order of first appearance is kept.
 */
export function buildRegions(inputs: readonly RegionInput[], random?: RandomSource): BuildRegionsResult {
  const regions: BoundedRegion[] = [];
  const issues: LoadIssue[] = [];
  const seen = new Set<string>();
  inputs.forEach((input) => {
    if (seen.has(input.name)) {
      issues.push({ kind: "duplicate-region", region: input.name });
      return;
    }
    const sanitized = sanitizeRings(input.name, input.rings);
    issues.push(...sanitized.issues);
    if (sanitized.rings.length === 0) {
      issues.push({ kind: "empty-region", region: input.name });
      return;
    }
    seen.add(input.name);
    regions.push(new BoundedRegion(input.name, sanitized.rings, { population: input.population, random }));
  });
  return { regions, issues };
}
