import { z } from "zod";

/**
 * Zod schemas for the records the transit pipeline produces.
 *
 * Types are inferred from the schemas; the pipeline builds these records
 * itself, so parsing is only needed where data crosses a boundary
 * (provider output, configuration, persisted payloads).
 */

export const BODY_NAMES = [
  "sun",
  "moon",
  "mercury",
  "venus",
  "mars",
  "jupiter",
  "saturn",
  "uranus",
  "neptune",
  "pluto",
] as const;

export const HOUSE_SYSTEM_CODES = ["P", "K", "O", "R", "C", "A", "V", "W"] as const;

export const ASPECT_NAMES = [
  "conjunction",
  "opposition",
  "trine",
  "square",
  "sextile",
  "quincunx",
  "semisextile",
  "semisquare",
  "sesquisquare",
] as const;

export const BodyIdSchema = z.enum(BODY_NAMES);
export const HouseSystemCodeSchema = z.enum(HOUSE_SYSTEM_CODES);
export const AspectNameSchema = z.enum(ASPECT_NAMES);

export const PositionSchema = z.object({
  body: BodyIdSchema,
  longitude: z.number().min(0).lt(360),
  latitude: z.number(),
  distance_au: z.number(),
  longitude_speed: z.number(),
  latitude_speed: z.number(),
  distance_speed: z.number(),
  julian_day: z.number(),
});

const Longitude = z.number().min(0).lt(360);

export const HouseAnglesSchema = z.object({
  julian_day: z.number(),
  house_system: HouseSystemCodeSchema,
  ascendant: Longitude,
  // index 0 is the 1st house cusp
  cusps: z.tuple([
    Longitude, Longitude, Longitude, Longitude,
    Longitude, Longitude, Longitude, Longitude,
    Longitude, Longitude, Longitude, Longitude,
  ]),
  angles: z.object({
    ascendant: Longitude,
    midheaven: Longitude,
    armc: Longitude,
    vertex: Longitude,
  }),
});

export const AspectDefinitionSchema = z.object({
  name: AspectNameSchema,
  angle: z.number().min(0).max(180),
  orb: z.number().min(0),
});

export const AspectMatchSchema = z.object({
  body1: BodyIdSchema,
  body2: BodyIdSchema,
  set1: z.string(),
  set2: z.string(),
  aspect: AspectNameSchema,
  exact_angle: z.number().min(0).max(180),
  orb: z.number().min(0),
  body1_retrograde: z.boolean(),
  body2_retrograde: z.boolean(),
});

export const GeoLocationSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  altitude_m: z.number().default(0),
});

export type BodyId = z.infer<typeof BodyIdSchema>;
export type HouseSystemCode = z.infer<typeof HouseSystemCodeSchema>;
export type AspectName = z.infer<typeof AspectNameSchema>;
export type Position = Readonly<z.infer<typeof PositionSchema>>;
export type HouseAngles = Readonly<z.infer<typeof HouseAnglesSchema>>;
export type AspectDefinition = Readonly<z.infer<typeof AspectDefinitionSchema>>;
export type AspectMatch = Readonly<z.infer<typeof AspectMatchSchema>>;
export type GeoLocation = z.input<typeof GeoLocationSchema>;

/**
 * Positions keyed by body. Insertion order is iteration order, and the
 * aspect matcher's output order depends on it.
 */
export type PositionSet = Partial<Record<BodyId, Position>>;

export type HouseNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12;

export function cuspOf(houses: HouseAngles, house: HouseNumber): number {
  return houses.cusps[house - 1];
}
