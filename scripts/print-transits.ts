#!/usr/bin/env node
/**
 * Print transits to a natal moment as JSON.
 *
 * Usage:
 *   npx tsx scripts/print-transits.ts <natal YYYY-MM-DDTHH:mm> <transit YYYY-MM-DDTHH:mm> [utcOffsetHours]
 *
 * Both datetimes share the UTC offset. Set SWISSEPH_EPHE_PATH to use .se1
 * files instead of the Moshier model.
 */

import "dotenv/config";
import { parseCivilDateTime } from "../astro/civilTime.js";
import { computeTransits } from "../astro/computeTransits.js";
import { loadConfig } from "../astro/config.js";
import { positionsAt, toJulianDay } from "../astro/ephemeris/ephemerisAccess.js";
import { createSwissEphemerisProvider } from "../astro/ephemeris/swisseph.js";

function usage(): never {
  console.error(
    "Usage: tsx scripts/print-transits.ts <natal YYYY-MM-DDTHH:mm> <transit YYYY-MM-DDTHH:mm> [utcOffsetHours]"
  );
  process.exit(1);
}

async function main() {
  const [, , natalArg, transitArg, offsetArg = "0"] = process.argv;
  if (!natalArg || !transitArg) usage();

  const utcOffsetHours = Number(offsetArg);
  if (!Number.isFinite(utcOffsetHours)) usage();

  const config = loadConfig();
  const provider = createSwissEphemerisProvider({ ephePath: config.SWISSEPH_EPHE_PATH });

  const natalJd = toJulianDay(provider, parseCivilDateTime(natalArg), utcOffsetHours);
  const natal = positionsAt(provider, natalJd);
  const report = computeTransits(
    provider,
    natal,
    parseCivilDateTime(transitArg),
    utcOffsetHours
  );

  console.log(JSON.stringify({ natal_julian_day: natalJd, ...report }, null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
