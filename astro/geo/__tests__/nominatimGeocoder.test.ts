import { afterEach, describe, expect, it, vi } from "vitest";
import { GeocoderError, GeocoderTimeoutError } from "../../errors.js";
import { NominatimGeocoder } from "../nominatimGeocoder.js";

const geocoder = new NominatimGeocoder({
  baseUrl: "https://geo.test",
  userAgent: "transit-engine-tests",
  timeoutMs: 500,
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("NominatimGeocoder", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("resolves the first search hit", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValue(
        jsonResponse([{ lat: "48.8566", lon: "2.3522", display_name: "Paris" }])
      );
    vi.stubGlobal("fetch", fetchMock);

    await expect(geocoder.resolve("Paris, France")).resolves.toEqual({
      latitude: 48.8566,
      longitude: 2.3522,
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe(
      "https://geo.test/search?q=Paris%2C+France&format=json&limit=1"
    );
    expect(init.headers["User-Agent"]).toBe("transit-engine-tests");
  });

  it("resolves null when nothing matches", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse([])));

    await expect(geocoder.resolve("Nowhere")).resolves.toBeNull();
  });

  it("throws GeocoderTimeoutError on timeout", async () => {
    const timeout = Object.assign(new Error("The operation timed out"), {
      name: "TimeoutError",
    });
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(timeout));

    await expect(geocoder.resolve("Paris")).rejects.toBeInstanceOf(GeocoderTimeoutError);
  });

  it("throws GeocoderTimeoutError when the body read times out", async () => {
    const timeout = Object.assign(new Error("The operation timed out"), {
      name: "TimeoutError",
    });
    const stalled = {
      ok: true,
      status: 200,
      json: () => Promise.reject(timeout),
    };
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(stalled));

    await expect(geocoder.resolve("Paris")).rejects.toBeInstanceOf(GeocoderTimeoutError);
  });

  it("throws GeocoderError on an HTTP error", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({}, 503)));

    await expect(geocoder.resolve("Paris")).rejects.toThrow(
      'Geocoding failed for "Paris" (HTTP 503)'
    );
  });

  it("throws GeocoderError on an unexpected payload", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ error: "nope" })));

    await expect(geocoder.resolve("Paris")).rejects.toBeInstanceOf(GeocoderError);
  });

  it("propagates network failures", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

    await expect(geocoder.resolve("Paris")).rejects.toThrow("fetch failed");
  });
});
