/**
 * Ephemeris access facade.
 *
 * Turns provider calls into Position and HouseAngles records. Nothing is
 * cached: every call goes back to the provider.
 */

import { assertValidCivilDateTime, type CivilDateTime } from "../civilTime.js";
import { EphemerisError, InvalidDateError } from "../errors.js";
import {
  BODY_NAMES,
  type BodyId,
  type GeoLocation,
  type HouseAngles,
  type HouseSystemCode,
  type Position,
  type PositionSet,
} from "../schemas/transit.schema.js";
import { normalizeDegrees } from "../zodiac.js";
import type { EphemerisProvider, RawHouses } from "./provider.js";

function callProvider<T>(
  fn: () => T,
  context: { julianDay?: number; body?: string; what: string }
): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof EphemerisError) throw err;
    const detail = err instanceof Error ? err.message : String(err);
    throw new EphemerisError(`Failed to compute ${context.what}: ${detail}`, {
      julianDay: context.julianDay,
      body: context.body,
      cause: err,
    });
  }
}

function requireFinite(
  values: Record<string, number>,
  context: { julianDay: number; body?: string; what: string }
): void {
  for (const [key, value] of Object.entries(values)) {
    if (!Number.isFinite(value)) {
      throw new EphemerisError(
        `Ephemeris returned non-finite ${key} for ${context.what} at JD ${context.julianDay}`,
        { julianDay: context.julianDay, body: context.body }
      );
    }
  }
}

/**
 * Julian Day for a civil datetime. The UTC hour is
 * hour - utcOffsetHours + minute / 60 and may spill outside 0-24.
 */
export function toJulianDay(
  provider: EphemerisProvider,
  civil: CivilDateTime,
  utcOffsetHours: number
): number {
  assertValidCivilDateTime(civil);
  if (!Number.isFinite(utcOffsetHours)) {
    throw new InvalidDateError("utcOffsetHours", utcOffsetHours);
  }

  const hourUt = civil.hour - utcOffsetHours + civil.minute / 60;
  const jd = callProvider(
    () => provider.civilToJulianDay(civil.year, civil.month, civil.day, hourUt),
    { what: "Julian Day" }
  );
  if (!Number.isFinite(jd)) {
    throw new EphemerisError("Failed to compute Julian Day");
  }
  return jd;
}

export function positionOf(
  provider: EphemerisProvider,
  julianDay: number,
  body: BodyId
): Position {
  const raw = callProvider(() => provider.computeBody(julianDay, body), {
    julianDay,
    body,
    what: body,
  });
  requireFinite(
    {
      longitude: raw.longitude,
      latitude: raw.latitude,
      distance: raw.distance,
      longitude_speed: raw.longitude_speed,
      latitude_speed: raw.latitude_speed,
      distance_speed: raw.distance_speed,
    },
    { julianDay, body, what: body }
  );

  return {
    body,
    longitude: normalizeDegrees(raw.longitude),
    latitude: raw.latitude,
    distance_au: raw.distance,
    longitude_speed: raw.longitude_speed,
    latitude_speed: raw.latitude_speed,
    distance_speed: raw.distance_speed,
    julian_day: julianDay,
  };
}

/**
 * Positions of all ten bodies, one provider call each, in BODY_NAMES order.
 */
export function positionsAt(
  provider: EphemerisProvider,
  julianDay: number
): PositionSet {
  const positions: PositionSet = {};
  for (const body of BODY_NAMES) {
    positions[body] = positionOf(provider, julianDay, body);
  }
  return positions;
}

function toHouseAngles(
  raw: RawHouses,
  julianDay: number,
  houseSystem: HouseSystemCode
): HouseAngles {
  if (raw.cusps.length !== 12) {
    throw new EphemerisError(
      `Expected 12 house cusps, got ${raw.cusps.length}`,
      { julianDay }
    );
  }
  requireFinite(
    {
      ascendant: raw.ascendant,
      midheaven: raw.midheaven,
      armc: raw.armc,
      vertex: raw.vertex,
      ...Object.fromEntries(
        raw.cusps.map((c, i): [string, number] => [`cusp ${i + 1}`, c])
      ),
    },
    { julianDay, what: "houses" }
  );

  const [c1, c2, c3, c4, c5, c6, c7, c8, c9, c10, c11, c12] = raw.cusps.map(
    normalizeDegrees
  );

  return {
    julian_day: julianDay,
    house_system: houseSystem,
    // cusp 1, which is not the ascendant degree under whole-sign houses
    ascendant: c1,
    cusps: [c1, c2, c3, c4, c5, c6, c7, c8, c9, c10, c11, c12],
    angles: {
      ascendant: normalizeDegrees(raw.ascendant),
      midheaven: normalizeDegrees(raw.midheaven),
      armc: normalizeDegrees(raw.armc),
      vertex: normalizeDegrees(raw.vertex),
    },
  };
}

/**
 * Ascendant, 12 cusps and the four angles for a time and place.
 *
 * The provider's topocentric location is process-wide state. It is set and
 * consumed inside this one synchronous call, and computeHouses also gets the
 * location explicitly, so no other caller can run between the two.
 */
export function housesAt(
  provider: EphemerisProvider,
  julianDay: number,
  location: GeoLocation,
  houseSystem: HouseSystemCode = "P"
): HouseAngles {
  const raw = callProvider(
    () => {
      provider.setTopocentric(location);
      return provider.computeHouses(julianDay, location, houseSystem);
    },
    { julianDay, what: "houses" }
  );
  return toHouseAngles(raw, julianDay, houseSystem);
}
