import { createRequire } from "node:module";
import path from "node:path";
import fs from "node:fs";
import { z } from "zod";
import { EphemerisError } from "../errors.js";
import { transitLog } from "../../logging/transitLog.js";
import type { BodyId, HouseSystemCode } from "../schemas/transit.schema.js";
import type { EphemerisProvider, RawBodyState, RawHouses } from "./provider.js";

const require = createRequire(import.meta.url);

const REQUIRED_PREFIXES = ["sepl_", "semo_", "seas_"];

/**
 * The part of the swisseph native binding this adapter uses.
 */
interface SwissEphBinding {
  SE_SUN: number;
  SE_MOON: number;
  SE_MERCURY: number;
  SE_VENUS: number;
  SE_MARS: number;
  SE_JUPITER: number;
  SE_SATURN: number;
  SE_URANUS: number;
  SE_NEPTUNE: number;
  SE_PLUTO: number;
  SE_GREG_CAL: number;
  SEFLG_SWIEPH: number;
  SEFLG_MOSEPH: number;
  SEFLG_SPEED: number;
  swe_set_ephe_path(path: string): void;
  swe_julday(year: number, month: number, day: number, hour: number, gregflag: number): number;
  swe_calc_ut(jd: number, ipl: number, iflag: number): unknown;
  swe_set_topo(geolon: number, geolat: number, altitude: number): void;
  swe_houses(jd: number, geolat: number, geolon: number, hsys: string): unknown;
  swe_version(): string;
}

let binding: SwissEphBinding | undefined;

// Loaded on first use so that importing this module does not require the
// native addon to be built.
function loadBinding(): SwissEphBinding {
  if (!binding) {
    const loaded: SwissEphBinding = require("swisseph");
    binding = loaded;
    return loaded;
  }
  return binding;
}

const CalcResultSchema = z.union([
  z.object({
    longitude: z.number(),
    latitude: z.number(),
    distance: z.number(),
    longitudeSpeed: z.number(),
    latitudeSpeed: z.number(),
    distanceSpeed: z.number(),
    rflag: z.number().optional(),
  }),
  z.object({
    xx: z.array(z.number()).min(6),
    rflag: z.number().optional(),
  }),
]);

const ErrorResultSchema = z.object({ error: z.string().min(1) });

const HousesResultSchema = z.object({
  house: z.array(z.number()),
  ascendant: z.number(),
  mc: z.number(),
  armc: z.number(),
  vertex: z.number(),
});

export function ensureEphePath(ephePath: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(ephePath);
  } catch {
    throw new Error(
      `Swiss Ephemeris data files not found at ${ephePath}. ` +
        "Point SWISSEPH_EPHE_PATH at a directory of .se1 files."
    );
  }

  if (!stats.isDirectory()) {
    throw new Error(`Swiss Ephemeris path ${ephePath} is not a directory.`);
  }

  const se1Files = fs
    .readdirSync(ephePath)
    .filter((name) => name.toLowerCase().endsWith(".se1"));

  if (!se1Files.length) {
    throw new Error(
      `Swiss Ephemeris .se1 files are missing in ${ephePath}. ` +
        "Download the Swiss Ephemeris data set and place the .se1 files there."
    );
  }

  const missing = REQUIRED_PREFIXES.filter(
    (prefix) => !se1Files.some((name) => name.toLowerCase().startsWith(prefix))
  );

  if (missing.length) {
    throw new Error(
      `Swiss Ephemeris .se1 files incomplete in ${ephePath}. Missing prefixes: ${missing.join(
        ", "
      )}. Found: ${se1Files.join(", ")}.`
    );
  }
}

/**
 * Normalize a swe_calc_ut result. Older builds of the binding return the raw
 * xx array, newer ones named fields.
 */
export function readCalcResult(
  result: unknown,
  context: { julianDay: number; body: BodyId; moshierFlag?: number }
): RawBodyState {
  const failed = ErrorResultSchema.safeParse(result);
  if (failed.success) {
    throw new EphemerisError(failed.data.error, context);
  }

  const parsed = CalcResultSchema.safeParse(result);
  if (!parsed.success) {
    const keys =
      result && typeof result === "object" ? Object.keys(result).join(", ") : "";
    throw new EphemerisError(
      `Swiss Ephemeris returned invalid data (keys: ${keys || "none"}).`,
      context
    );
  }

  const data = parsed.data;
  if (data.rflag !== undefined && data.rflag < 0) {
    throw new EphemerisError("Swiss Ephemeris calculation failed", context);
  }
  if (
    context.moshierFlag !== undefined &&
    data.rflag !== undefined &&
    data.rflag & context.moshierFlag
  ) {
    throw new EphemerisError(
      "Swiss Ephemeris fell back to Moshier (SEFLG_MOSEPH) unexpectedly",
      context
    );
  }

  if ("xx" in data) {
    const [longitude, latitude, distance, lonSpeed, latSpeed, distSpeed] = data.xx;
    return {
      longitude,
      latitude,
      distance,
      longitude_speed: lonSpeed,
      latitude_speed: latSpeed,
      distance_speed: distSpeed,
    };
  }

  return {
    longitude: data.longitude,
    latitude: data.latitude,
    distance: data.distance,
    longitude_speed: data.longitudeSpeed,
    latitude_speed: data.latitudeSpeed,
    distance_speed: data.distanceSpeed,
  };
}

export function readHousesResult(result: unknown, julianDay: number): RawHouses {
  const failed = ErrorResultSchema.safeParse(result);
  if (failed.success) {
    throw new EphemerisError(failed.data.error, { julianDay });
  }
  const parsed = HousesResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new EphemerisError("Swiss Ephemeris returned invalid house data", {
      julianDay,
    });
  }
  return {
    cusps: parsed.data.house.slice(0, 12),
    ascendant: parsed.data.ascendant,
    midheaven: parsed.data.mc,
    armc: parsed.data.armc,
    vertex: parsed.data.vertex,
  };
}

export interface SwissEphemerisOptions {
  /** Directory of .se1 files. Without it the built-in Moshier model is used. */
  ephePath?: string;
}

export function createSwissEphemerisProvider(
  options: SwissEphemerisOptions = {}
): EphemerisProvider {
  const swe = loadBinding();
  const ephePath = options.ephePath ? path.resolve(options.ephePath) : undefined;

  if (ephePath) {
    ensureEphePath(ephePath);
    swe.swe_set_ephe_path(ephePath);
  }

  const calcFlags =
    (ephePath ? swe.SEFLG_SWIEPH : swe.SEFLG_MOSEPH) | swe.SEFLG_SPEED;

  const bodyMap: Record<BodyId, number> = {
    sun: swe.SE_SUN,
    moon: swe.SE_MOON,
    mercury: swe.SE_MERCURY,
    venus: swe.SE_VENUS,
    mars: swe.SE_MARS,
    jupiter: swe.SE_JUPITER,
    saturn: swe.SE_SATURN,
    uranus: swe.SE_URANUS,
    neptune: swe.SE_NEPTUNE,
    pluto: swe.SE_PLUTO,
  };

  transitLog({
    event: "ephemeris.initialized",
    engine: "swisseph",
    engine_version: swe.swe_version(),
    ephemeris: ephePath ?? "moshier",
  });

  return {
    civilToJulianDay(year, month, day, hourUt) {
      return swe.swe_julday(year, month, day, hourUt, swe.SE_GREG_CAL);
    },

    computeBody(julianDay, body) {
      if (!Number.isFinite(julianDay)) {
        throw new EphemerisError("Invalid Julian Day", { julianDay, body });
      }
      const result = swe.swe_calc_ut(julianDay, bodyMap[body], calcFlags);
      return readCalcResult(result, {
        julianDay,
        body,
        moshierFlag: ephePath ? swe.SEFLG_MOSEPH : undefined,
      });
    },

    setTopocentric(location) {
      swe.swe_set_topo(location.longitude, location.latitude, location.altitude_m ?? 0);
    },

    computeHouses(julianDay, location, houseSystem: HouseSystemCode) {
      const result = swe.swe_houses(
        julianDay,
        location.latitude,
        location.longitude,
        houseSystem
      );
      return readHousesResult(result, julianDay);
    },
  };
}
