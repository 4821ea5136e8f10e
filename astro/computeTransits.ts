import type { CivilDateTime } from "./civilTime.js";
import { findAspects } from "./computeAspects.js";
import { positionsAt, toJulianDay } from "./ephemeris/ephemerisAccess.js";
import type { EphemerisProvider } from "./ephemeris/provider.js";
import type { AspectMatch, PositionSet } from "./schemas/transit.schema.js";

export interface TransitReport {
  time: CivilDateTime;
  utc_offset_hours: number;
  julian_day: number;
  transit_positions: PositionSet;
  aspects: AspectMatch[];
}

/**
 * Transiting positions at a civil time and their aspects to the natal set.
 * Matches are labelled natal/transit with the natal body as body1.
 */
export function computeTransits(
  provider: EphemerisProvider,
  natal: PositionSet,
  time: CivilDateTime,
  utcOffsetHours: number,
  options: { maxOrb?: number } = {}
): TransitReport {
  const julianDay = toJulianDay(provider, time, utcOffsetHours);
  const transitPositions = positionsAt(provider, julianDay);

  return {
    time,
    utc_offset_hours: utcOffsetHours,
    julian_day: julianDay,
    transit_positions: transitPositions,
    aspects: findAspects(natal, transitPositions, { maxOrb: options.maxOrb }),
  };
}
