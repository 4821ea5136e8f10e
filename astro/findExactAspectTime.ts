/**
 * Find when an aspect between a natal body and a transiting body is exact.
 *
 * Two-phase grid search, not a root finder:
 * 1. Coarse: step the window hourly until the orb drops below 0.1°.
 * 2. Fine: scan one hour either side of that sample minute by minute and
 *    return the minute with the smallest orb.
 *
 * Only the first coarse trigger counts. A fast body can cross exactness
 * between two hourly samples without either dipping below 0.1°; that
 * window returns null. The step sizes and threshold are fixed.
 */

import {
  addMinutes,
  compareCivil,
  formatCivil,
  type CivilDateTime,
} from "./civilTime.js";
import { getAspectDefinition } from "./computeAspects.js";
import { positionOf, toJulianDay } from "./ephemeris/ephemerisAccess.js";
import type { EphemerisProvider } from "./ephemeris/provider.js";
import type { AspectName, BodyId, PositionSet } from "./schemas/transit.schema.js";
import { circularOrb } from "./zodiac.js";
import { transitLogHelpers } from "../logging/transitLog.js";

export const COARSE_STEP_MINUTES = 60;
export const COARSE_TRIGGER_ORB_DEG = 0.1; // ~6 arc-minutes
export const FINE_STEP_MINUTES = 1;
export const FINE_HALF_WINDOW_MINUTES = 60;

export interface TimeWindow {
  start: CivilDateTime;
  end: CivilDateTime;
  utcOffsetHours: number;
}

export interface FindExactAspectTimeInput {
  natal: PositionSet;
  window: TimeWindow;
  /** Natal body. */
  body1: BodyId;
  /** Transiting body. */
  body2: BodyId;
  aspect: AspectName;
}

export interface ExactAspectTime {
  time: CivilDateTime;
  julian_day: number;
  orb: number;
}

export function findExactAspectTime(
  provider: EphemerisProvider,
  input: FindExactAspectTimeInput
): ExactAspectTime | null {
  const { natal, window, body1, body2 } = input;
  const aspect = getAspectDefinition(input.aspect);

  const natalPosition = natal[body1];
  if (!natalPosition) {
    throw new Error(`Natal positions have no entry for ${body1}`);
  }
  const natalLongitude = natalPosition.longitude;

  const sample = (time: CivilDateTime): { julianDay: number; orb: number } => {
    const julianDay = toJulianDay(provider, time, window.utcOffsetHours);
    const transit = positionOf(provider, julianDay, body2);
    return {
      julianDay,
      orb: circularOrb(natalLongitude, transit.longitude, aspect.angle),
    };
  };

  for (
    let current = window.start;
    compareCivil(current, window.end) <= 0;
    current = addMinutes(current, COARSE_STEP_MINUTES)
  ) {
    const coarse = sample(current);
    if (coarse.orb >= COARSE_TRIGGER_ORB_DEG) continue;

    transitLogHelpers.coarseTriggered({
      body1,
      body2,
      aspect: aspect.name,
      at: formatCivil(current),
      orb: coarse.orb,
    });

    let best: ExactAspectTime | null = null;
    const fineEnd = addMinutes(current, FINE_HALF_WINDOW_MINUTES);
    for (
      let t = addMinutes(current, -FINE_HALF_WINDOW_MINUTES);
      compareCivil(t, fineEnd) <= 0;
      t = addMinutes(t, FINE_STEP_MINUTES)
    ) {
      const fine = sample(t);
      if (best === null || fine.orb < best.orb) {
        best = { time: t, julian_day: fine.julianDay, orb: fine.orb };
      }
    }
    return best;
  }

  transitLogHelpers.exactNotFound({
    body1,
    body2,
    aspect: aspect.name,
    start: formatCivil(window.start),
    end: formatCivil(window.end),
  });
  return null;
}
