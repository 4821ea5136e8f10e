/**
 * Natal chart for a named place and civil time.
 *
 * This is the orchestration layer: it owns the geocoder call and turns a
 * missing place or a geocoder timeout into a tagged result. Other geocoder
 * and ephemeris failures propagate.
 */

import type { CivilDateTime } from "./civilTime.js";
import { housesAt, positionsAt, toJulianDay } from "./ephemeris/ephemerisAccess.js";
import type { EphemerisProvider } from "./ephemeris/provider.js";
import { GeocoderTimeoutError } from "./errors.js";
import type { GeoCoordinates, Geocoder } from "./geo/geocoder.js";
import type {
  HouseAngles,
  HouseSystemCode,
  PositionSet,
} from "./schemas/transit.schema.js";
import { transitLogHelpers } from "../logging/transitLog.js";

export interface NatalChart {
  location: { name: string; latitude: number; longitude: number };
  time: { civil: CivilDateTime; utc_offset_hours: number; julian_day: number };
  houses: HouseAngles;
  planets: PositionSet;
}

export type ComputeChartResult =
  | { status: "ok"; chart: NatalChart }
  | { status: "location_not_found" }
  | { status: "geocoder_timeout" };

export interface ComputeChartInput {
  locationName: string;
  birth: CivilDateTime;
  utcOffsetHours: number;
  houseSystem?: HouseSystemCode;
}

export async function computeChart(
  deps: { provider: EphemerisProvider; geocoder: Geocoder },
  input: ComputeChartInput
): Promise<ComputeChartResult> {
  let coords: GeoCoordinates | null;
  try {
    coords = await deps.geocoder.resolve(input.locationName);
  } catch (err) {
    if (err instanceof GeocoderTimeoutError) {
      transitLogHelpers.geocoderTimeout({ location_name: input.locationName });
      return { status: "geocoder_timeout" };
    }
    throw err;
  }

  if (!coords) {
    transitLogHelpers.locationNotFound({ location_name: input.locationName });
    return { status: "location_not_found" };
  }

  const julianDay = toJulianDay(deps.provider, input.birth, input.utcOffsetHours);
  const houses = housesAt(
    deps.provider,
    julianDay,
    { latitude: coords.latitude, longitude: coords.longitude },
    input.houseSystem ?? "P"
  );
  const planets = positionsAt(deps.provider, julianDay);

  return {
    status: "ok",
    chart: {
      location: {
        name: input.locationName,
        latitude: coords.latitude,
        longitude: coords.longitude,
      },
      time: {
        civil: input.birth,
        utc_offset_hours: input.utcOffsetHours,
        julian_day: julianDay,
      },
      houses,
      planets,
    },
  };
}
