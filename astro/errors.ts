/**
 * Error model for the transit pipeline.
 * NotFound from the exact-aspect solver is a null result, not an error.
 */

export class InvalidDateError extends Error {
  constructor(public field: string, public value: number) {
    super(`Invalid ${field}: ${value}`);
    this.name = "InvalidDateError";
  }
}

export class EphemerisError extends Error {
  public julianDay?: number;
  public body?: string;

  constructor(
    message: string,
    details: { julianDay?: number; body?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = "EphemerisError";
    this.julianDay = details.julianDay;
    this.body = details.body;
  }
}

export class MissingJulianDayError extends Error {
  constructor(public label: string) {
    super(`No julian_day found for ${label}`);
    this.name = "MissingJulianDayError";
  }
}

export class GeocoderTimeoutError extends Error {
  constructor(public query: string) {
    super(`Geocoding timed out for "${query}"`);
    this.name = "GeocoderTimeoutError";
  }
}

export class GeocoderError extends Error {
  constructor(public query: string, public status?: number) {
    super(
      status === undefined
        ? `Geocoding failed for "${query}"`
        : `Geocoding failed for "${query}" (HTTP ${status})`
    );
    this.name = "GeocoderError";
  }
}
