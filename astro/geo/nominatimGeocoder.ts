import { z } from "zod";
import { GeocoderError, GeocoderTimeoutError } from "../errors.js";
import type { GeoCoordinates, Geocoder } from "./geocoder.js";

const SearchResultSchema = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
    display_name: z.string().optional(),
  })
);

export interface NominatimGeocoderOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
}

function isTimeout(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === "TimeoutError" || err.name === "AbortError")
  );
}

export class NominatimGeocoder implements Geocoder {
  constructor(private readonly options: NominatimGeocoderOptions) {}

  async resolve(name: string): Promise<GeoCoordinates | null> {
    const url = new URL("/search", this.options.baseUrl);
    url.searchParams.set("q", name);
    url.searchParams.set("format", "json");
    url.searchParams.set("limit", "1");

    // The timeout signal also aborts reading the body, so both awaits sit
    // inside the same try.
    let status: number;
    let body: unknown;
    try {
      const res = await fetch(url, {
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      status = res.status;
      body = res.ok ? await res.json() : undefined;
    } catch (err) {
      if (isTimeout(err)) throw new GeocoderTimeoutError(name);
      throw err;
    }

    if (status < 200 || status >= 300) {
      throw new GeocoderError(name, status);
    }

    const parsed = SearchResultSchema.safeParse(body);
    if (!parsed.success) {
      throw new GeocoderError(name);
    }

    const first = parsed.data[0];
    if (!first || !Number.isFinite(first.lat) || !Number.isFinite(first.lon)) {
      return null;
    }
    return { latitude: first.lat, longitude: first.lon };
  }
}
