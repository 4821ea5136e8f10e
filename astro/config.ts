import { z } from "zod";
import { HouseSystemCodeSchema } from "./schemas/transit.schema.js";

const EnvSchema = z.object({
  SWISSEPH_EPHE_PATH: z.string().min(1).optional(),
  GEOCODER_BASE_URL: z
    .string()
    .url()
    .default("https://nominatim.openstreetmap.org"),
  GEOCODER_USER_AGENT: z.string().min(1).default("transit-engine"),
  GEOCODER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  DEFAULT_HOUSE_SYSTEM: HouseSystemCodeSchema.default("P"),
});

export type TransitConfig = z.infer<typeof EnvSchema>;

/**
 * Read configuration from the environment. Scripts import "dotenv/config"
 * first so a local .env is picked up. TRANSIT_LOG_LEVEL is not parsed here;
 * logging/transitLog.ts reads it itself.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): TransitConfig {
  // Treat empty strings as unset so `FOO=` in .env falls back to the default.
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  return EnvSchema.parse(cleaned);
}
