/**
 * Pure functions for matching aspects between two sets of positions.
 * Layer 0: no interpretation, only geometric relationships.
 */

import {
  BodyIdSchema,
  type AspectDefinition,
  type AspectMatch,
  type AspectName,
  type BodyId,
  type Position,
  type PositionSet,
} from "./schemas/transit.schema.js";
import { circularOrb } from "./zodiac.js";

/**
 * Aspect catalog in matching order. Orbs are the maximum deviation from the
 * exact angle, in degrees.
 */
export const ASPECTS: readonly AspectDefinition[] = [
  { name: "conjunction", angle: 0, orb: 8 },
  { name: "opposition", angle: 180, orb: 8 },
  { name: "trine", angle: 120, orb: 8 },
  { name: "square", angle: 90, orb: 8 },
  { name: "sextile", angle: 60, orb: 6 },
  { name: "quincunx", angle: 150, orb: 3 },
  { name: "semisextile", angle: 30, orb: 3 },
  { name: "semisquare", angle: 45, orb: 2 },
  { name: "sesquisquare", angle: 135, orb: 2 },
] as const;

export function getAspectDefinition(name: AspectName): AspectDefinition {
  const aspect = ASPECTS.find((a) => a.name === name);
  if (!aspect) {
    throw new Error(`Unknown aspect: ${name}`);
  }
  return aspect;
}

/**
 * Zero speed is stationary, not retrograde.
 */
export function isRetrograde(position: Pick<Position, "longitude_speed">): boolean {
  return position.longitude_speed < 0;
}

export interface FindAspectsOptions {
  /** Drop matches above this orb, on top of each aspect's own orb. */
  maxOrb?: number;
  labels?: { a: string; b: string };
}

// The mapping key names the body, not position.body.
function entriesOf(set: PositionSet): Array<[BodyId, Position]> {
  const entries: Array<[BodyId, Position]> = [];
  for (const [key, position] of Object.entries(set)) {
    const body = BodyIdSchema.safeParse(key);
    if (body.success && position) entries.push([body.data, position]);
  }
  return entries;
}

/**
 * Every aspect between setA and setB.
 *
 * Iterates setA x setB x ASPECTS in insertion order and keeps that order.
 * A pair can match more than one aspect; nothing is deduplicated, so
 * findAspects(a, b) and findAspects(b, a) differ in order.
 */
export function findAspects(
  setA: PositionSet,
  setB: PositionSet,
  options: FindAspectsOptions = {}
): AspectMatch[] {
  const { maxOrb } = options;
  const labels = options.labels ?? { a: "natal", b: "transit" };
  const matches: AspectMatch[] = [];

  const entriesB = entriesOf(setB);
  for (const [body1, pos1] of entriesOf(setA)) {
    for (const [body2, pos2] of entriesB) {
      for (const aspect of ASPECTS) {
        const orb = circularOrb(pos1.longitude, pos2.longitude, aspect.angle);

        if (maxOrb !== undefined && orb > maxOrb) continue;

        if (orb <= aspect.orb) {
          matches.push({
            body1,
            body2,
            set1: labels.a,
            set2: labels.b,
            aspect: aspect.name,
            exact_angle: aspect.angle,
            orb,
            body1_retrograde: isRetrograde(pos1),
            body2_retrograde: isRetrograde(pos2),
          });
        }
      }
    }
  }

  return matches;
}
