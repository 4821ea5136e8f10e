import { housesAt } from "./ephemeris/ephemerisAccess.js";
import type { EphemerisProvider } from "./ephemeris/provider.js";
import { MissingJulianDayError } from "./errors.js";
import type {
  GeoLocation,
  HouseAngles,
  HouseSystemCode,
} from "./schemas/transit.schema.js";
import { transitLogHelpers } from "../logging/transitLog.js";

export interface HouseBatchEntry {
  julian_day?: number | null;
}

export interface HouseBatchResult {
  houses: Record<string, HouseAngles>;
  skipped: MissingJulianDayError[];
}

/**
 * Houses for each labelled entry at its own julian_day, all at one location.
 *
 * Entries without a julian_day are skipped with a warning and reported in
 * `skipped`; the rest of the batch still runs. Provider failures are not
 * caught.
 */
export function computeHousesForPositions(
  provider: EphemerisProvider,
  entries: Record<string, HouseBatchEntry>,
  location: GeoLocation,
  houseSystem: HouseSystemCode = "P"
): HouseBatchResult {
  const houses: Record<string, HouseAngles> = {};
  const skipped: MissingJulianDayError[] = [];

  for (const [label, entry] of Object.entries(entries)) {
    const jd = entry.julian_day;
    if (jd === undefined || jd === null) {
      const err = new MissingJulianDayError(label);
      skipped.push(err);
      transitLogHelpers.batchEntrySkipped({ label, reason: err.message });
      continue;
    }

    houses[label] = housesAt(provider, jd, location, houseSystem);
  }

  return { houses, skipped };
}
