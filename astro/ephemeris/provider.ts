import type {
  BodyId,
  GeoLocation,
  HouseSystemCode,
} from "../schemas/transit.schema.js";

/**
 * Raw body state as an ephemeris returns it, before normalization.
 * Speeds are per day.
 */
export interface RawBodyState {
  longitude: number;
  latitude: number;
  distance: number;
  longitude_speed: number;
  latitude_speed: number;
  distance_speed: number;
}

export interface RawHouses {
  cusps: number[];
  ascendant: number;
  midheaven: number;
  armc: number;
  vertex: number;
}

/**
 * Boundary to the astronomical engine. All calls are synchronous and
 * in-process.
 *
 * setTopocentric mutates process-wide engine state. Callers go through
 * housesAt, which sets it and computes houses in the same synchronous call.
 */
export interface EphemerisProvider {
  civilToJulianDay(year: number, month: number, day: number, hourUt: number): number;
  computeBody(julianDay: number, body: BodyId): RawBodyState;
  setTopocentric(location: GeoLocation): void;
  computeHouses(
    julianDay: number,
    location: GeoLocation,
    houseSystem: HouseSystemCode
  ): RawHouses;
}
