/**
 * Structured logging for transit pipeline events.
 *
 * One JSON line per event. Debug events are written only when
 * TRANSIT_LOG_LEVEL=debug.
 */

export type TransitLogEvent =
  | "ephemeris.initialized"
  | "houses.batch.entry_skipped"
  | "aspect.exact.coarse_triggered"
  | "aspect.exact.not_found"
  | "chart.location_not_found"
  | "chart.geocoder_timeout";

export type TransitLogLevel = "debug" | "info" | "warn";

export type TransitLogData = {
  event: TransitLogEvent;
  level?: TransitLogLevel;
  [key: string]: unknown;
};

export function transitLog(data: TransitLogData): void {
  const level = data.level ?? "info";
  if (level === "debug" && process.env.TRANSIT_LOG_LEVEL !== "debug") {
    return;
  }

  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    ...data,
    level,
  });

  if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const transitLogHelpers = {
  batchEntrySkipped(params: { label: string; reason: string }): void {
    transitLog({
      event: "houses.batch.entry_skipped",
      level: "warn",
      label: params.label,
      reason: params.reason,
    });
  },

  coarseTriggered(params: {
    body1: string;
    body2: string;
    aspect: string;
    at: string;
    orb: number;
  }): void {
    transitLog({ event: "aspect.exact.coarse_triggered", level: "debug", ...params });
  },

  exactNotFound(params: {
    body1: string;
    body2: string;
    aspect: string;
    start: string;
    end: string;
  }): void {
    transitLog({ event: "aspect.exact.not_found", level: "debug", ...params });
  },

  locationNotFound(params: { location_name: string }): void {
    transitLog({ event: "chart.location_not_found", level: "warn", ...params });
  },

  geocoderTimeout(params: { location_name: string }): void {
    transitLog({ event: "chart.geocoder_timeout", level: "warn", ...params });
  },
};
