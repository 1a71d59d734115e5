import type { RegionName } from "../types.js";
import type { BoundedRegion } from "./region.js";

/** Holds at most one selected region and keeps the regions' flags in step with it. */
export class RegionSelection {
  private current: BoundedRegion | null = null;

  get selected(): BoundedRegion | null {
    return this.current;
  }

  get selectedName(): RegionName | null {
    return this.current?.name ?? null;
  }

  select(region: BoundedRegion | null): void {
    if (this.current) this.current.selected = false;
    this.current = region;
    if (region) region.selected = true;
  }

  clear(): void {
    this.select(null);
  }
}
