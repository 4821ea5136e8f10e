import { describe, expect, it } from "vitest";
import {
  ASPECTS,
  findAspects,
  getAspectDefinition,
  isRetrograde,
} from "../computeAspects.js";
import { AspectMatchSchema } from "../schemas/transit.schema.js";
import { position } from "./testProvider.js";

describe("aspect catalog", () => {
  it("declares the nine aspects in matching order", () => {
    expect(ASPECTS.map((a) => [a.name, a.angle, a.orb])).toEqual([
      ["conjunction", 0, 8],
      ["opposition", 180, 8],
      ["trine", 120, 8],
      ["square", 90, 8],
      ["sextile", 60, 6],
      ["quincunx", 150, 3],
      ["semisextile", 30, 3],
      ["semisquare", 45, 2],
      ["sesquisquare", 135, 2],
    ]);
  });

  it("looks up a definition by name", () => {
    expect(getAspectDefinition("trine")).toEqual({ name: "trine", angle: 120, orb: 8 });
  });
});

describe("isRetrograde", () => {
  it("is true only for negative longitude speed", () => {
    expect(isRetrograde({ longitude_speed: -0.5 })).toBe(true);
    expect(isRetrograde({ longitude_speed: 0 })).toBe(false);
    expect(isRetrograde({ longitude_speed: 0.5 })).toBe(false);
  });
});

describe("findAspects", () => {
  it("reports an exact opposition", () => {
    const matches = findAspects(
      { sun: position("sun", 10) },
      { sun: position("sun", 190) }
    );

    expect(matches).toEqual([
      {
        body1: "sun",
        body2: "sun",
        set1: "natal",
        set2: "transit",
        aspect: "opposition",
        exact_angle: 180,
        orb: 0,
        body1_retrograde: false,
        body2_retrograde: false,
      },
    ]);
    expect(() => AspectMatchSchema.parse(matches[0])).not.toThrow();
  });

  it("reports a square without sextile or trine at 90 degrees", () => {
    const matches = findAspects(
      { sun: position("sun", 10) },
      { sun: position("sun", 100) }
    );

    expect(matches.map((m) => [m.aspect, m.orb])).toEqual([["square", 0]]);
  });

  it("includes an orb exactly at the tolerance and nothing past it", () => {
    expect(
      findAspects({ sun: position("sun", 0) }, { mars: position("mars", 8) }).map(
        (m) => [m.aspect, m.orb]
      )
    ).toEqual([["conjunction", 8]]);
    expect(
      findAspects({ sun: position("sun", 0) }, { mars: position("mars", 66) }).map(
        (m) => [m.aspect, m.orb]
      )
    ).toEqual([["sextile", 6]]);
    expect(
      findAspects({ sun: position("sun", 0) }, { mars: position("mars", 8.5) })
    ).toEqual([]);
  });

  it("applies maxOrb on top of the aspect orb", () => {
    const natal = { sun: position("sun", 10) };
    const transit = { mars: position("mars", 195) };

    expect(findAspects(natal, transit).map((m) => [m.aspect, m.orb])).toEqual([
      ["opposition", 5],
    ]);
    expect(findAspects(natal, transit, { maxOrb: 5 })).toHaveLength(1);
    expect(findAspects(natal, transit, { maxOrb: 3 })).toEqual([]);
  });

  it("flags retrograde bodies", () => {
    const [match] = findAspects(
      { sun: position("sun", 10) },
      { mars: position("mars", 190, -0.5) }
    );
    expect(match.body1_retrograde).toBe(false);
    expect(match.body2_retrograde).toBe(true);
  });

  it("follows the iteration order of both sets", () => {
    const natal = { sun: position("sun", 10), moon: position("moon", 100) };
    const transit = { mars: position("mars", 190), venus: position("venus", 10) };

    const key = (m: { body1: string; body2: string; aspect: string }) =>
      `${m.body1}-${m.body2}-${m.aspect}`;

    expect(findAspects(natal, transit).map(key)).toEqual([
      "sun-mars-opposition",
      "sun-venus-conjunction",
      "moon-mars-square",
      "moon-venus-square",
    ]);
    expect(findAspects(transit, natal).map(key)).toEqual([
      "mars-sun-opposition",
      "mars-moon-square",
      "venus-sun-conjunction",
      "venus-moon-square",
    ]);
  });

  it("names bodies by their key in the set", () => {
    const [match] = findAspects(
      { moon: position("sun", 10) },
      { sun: position("sun", 190) }
    );
    expect(match.body1).toBe("moon");
    expect(match.body2).toBe("sun");
    expect(match.aspect).toBe("opposition");
  });

  it("uses custom set labels", () => {
    const [match] = findAspects(
      { sun: position("sun", 10) },
      { moon: position("moon", 10) },
      { labels: { a: "person_a", b: "person_b" } }
    );
    expect(match.set1).toBe("person_a");
    expect(match.set2).toBe("person_b");
  });
});
