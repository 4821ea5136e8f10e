/**
 * Pure angular geometry on the tropical zodiac.
 * Layer 0: no interpretation, only degrees.
 */

export const SIGN_NAMES = [
  "aries",
  "taurus",
  "gemini",
  "cancer",
  "leo",
  "virgo",
  "libra",
  "scorpio",
  "sagittarius",
  "capricorn",
  "aquarius",
  "pisces",
] as const;

export type SignName = (typeof SIGN_NAMES)[number];

/**
 * Normalize degrees to 0-360 range
 */
export function normalizeDegrees(value: number): number {
  let v = value % 360;
  if (v < 0) v += 360;
  // -1e-15 % 360 + 360 rounds up to exactly 360
  if (v >= 360) v -= 360;
  return v;
}

/**
 * Split an ecliptic longitude into its sign and the degree within that sign.
 */
export function signOf(longitude: number): { sign: SignName; degree: number } {
  const lon = normalizeDegrees(longitude);
  const index = Math.floor(lon / 30) % 12;
  return { sign: SIGN_NAMES[index], degree: lon % 30 };
}

/**
 * Format a decimal degree value as D°M'S".
 *
 * Every component is truncated, never rounded: 10.9999 formats as 10°59'59".
 * Other consumers compare these strings, so keep the truncation.
 */
export function formatDegree(value: number): string {
  const degrees = Math.trunc(value);
  const minutes = Math.trunc((value - degrees) * 60);
  const seconds = Math.trunc(((value - degrees) * 60 - minutes) * 60);
  return `${degrees}°${minutes}'${seconds}"`;
}

/**
 * Deviation of the separation between two longitudes from a target angle.
 * The separation is the short way round the circle (0-180).
 */
export function circularOrb(a: number, b: number, targetAngle: number): number {
  const diff = Math.abs(a - b);
  const separation = Math.min(diff, 360 - diff);
  return Math.abs(separation - targetAngle);
}
