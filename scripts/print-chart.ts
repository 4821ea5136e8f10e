#!/usr/bin/env node
/**
 * Resolve a place and print its natal chart as JSON.
 *
 * Usage:
 *   npx tsx scripts/print-chart.ts "<place>" <YYYY-MM-DDTHH:mm> [utcOffsetHours]
 */

import "dotenv/config";
import { parseCivilDateTime } from "../astro/civilTime.js";
import { computeChart } from "../astro/computeChart.js";
import { loadConfig } from "../astro/config.js";
import { createSwissEphemerisProvider } from "../astro/ephemeris/swisseph.js";
import { NominatimGeocoder } from "../astro/geo/nominatimGeocoder.js";

async function main() {
  const [, , place, birthArg, offsetArg = "0"] = process.argv;
  const utcOffsetHours = Number(offsetArg);
  if (!place || !birthArg || !Number.isFinite(utcOffsetHours)) {
    console.error(
      'Usage: tsx scripts/print-chart.ts "<place>" <YYYY-MM-DDTHH:mm> [utcOffsetHours]'
    );
    process.exit(1);
  }

  const config = loadConfig();
  const result = await computeChart(
    {
      provider: createSwissEphemerisProvider({ ephePath: config.SWISSEPH_EPHE_PATH }),
      geocoder: new NominatimGeocoder({
        baseUrl: config.GEOCODER_BASE_URL,
        userAgent: config.GEOCODER_USER_AGENT,
        timeoutMs: config.GEOCODER_TIMEOUT_MS,
      }),
    },
    {
      locationName: place,
      birth: parseCivilDateTime(birthArg),
      utcOffsetHours,
      houseSystem: config.DEFAULT_HOUSE_SYSTEM,
    }
  );

  if (result.status !== "ok") {
    console.error(`No chart: ${result.status}`);
    process.exit(1);
  }
  console.log(JSON.stringify(result.chart, null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
