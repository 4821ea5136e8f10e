export interface GeoCoordinates {
  latitude: number;
  longitude: number;
}

/**
 * Place name to coordinates. Resolves null when the place is unknown and
 * rejects with GeocoderTimeoutError on timeout.
 */
export interface Geocoder {
  resolve(name: string): Promise<GeoCoordinates | null>;
}
