import { afterEach, describe, expect, it, vi } from "vitest";
import { computeHousesForPositions } from "../computeHousesForPositions.js";
import { EphemerisError, MissingJulianDayError } from "../errors.js";
import { createLinearProvider, position } from "./testProvider.js";

const EPOCH = 2451545.0;
const location = { latitude: 51.5, longitude: -0.12 };

describe("computeHousesForPositions", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("skips an entry without julian_day and computes the rest", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const provider = createLinearProvider({ epochJd: EPOCH });

    const entries = {
      sun: { ...position("sun", 10), julian_day: EPOCH },
      moon: { ...position("moon", 42), julian_day: undefined },
      mars: { ...position("mars", 200), julian_day: EPOCH + 0.5 },
    };

    const result = computeHousesForPositions(provider, entries, location);

    expect(Object.keys(result.houses)).toEqual(["sun", "mars"]);
    expect(result.houses.sun.julian_day).toBe(EPOCH);
    expect(result.houses.mars.julian_day).toBe(EPOCH + 0.5);
    expect(result.houses.mars.house_system).toBe("P");

    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0]).toBeInstanceOf(MissingJulianDayError);
    expect(result.skipped[0].label).toBe("moon");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({
      event: "houses.batch.entry_skipped",
      level: "warn",
      label: "moon",
      reason: "No julian_day found for moon",
    });
  });

  it("treats a null julian_day as missing", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const provider = createLinearProvider({ epochJd: EPOCH });

    const result = computeHousesForPositions(
      provider,
      { natal: { julian_day: null } },
      location
    );

    expect(result.houses).toEqual({});
    expect(result.skipped.map((e) => e.label)).toEqual(["natal"]);
    expect(provider.calls.computeHouses).toBe(0);
  });

  it("uses the same location for every entry", () => {
    const provider = createLinearProvider({ epochJd: EPOCH });

    computeHousesForPositions(
      provider,
      { a: { julian_day: EPOCH }, b: { julian_day: EPOCH + 1 } },
      location,
      "W"
    );

    expect(provider.calls.setTopocentric).toEqual([location, location]);
    expect(provider.calls.computeHouses).toBe(2);
  });

  it("lets provider failures abort the batch", () => {
    const provider = {
      ...createLinearProvider({ epochJd: EPOCH }),
      computeHouses: () => {
        throw new Error("outside ephemeris coverage");
      },
    };

    expect(() =>
      computeHousesForPositions(provider, { a: { julian_day: EPOCH } }, location)
    ).toThrow(EphemerisError);
  });
});
