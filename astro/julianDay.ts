/**
 * Julian Day for a Gregorian calendar date and fractional UT hour
 * (Meeus, Astronomical Algorithms, ch. 7).
 *
 * For providers without their own calendar conversion, such as the linear
 * test provider; the Swiss Ephemeris adapter uses swe_julday instead.
 *
 * The hour may fall outside 0-24 after a UTC offset is applied; it simply
 * spills into the neighbouring day.
 */
export function julianDayFromCalendar(
  year: number,
  month: number,
  day: number,
  hourUt: number
): number {
  let y = year;
  let m = month;
  if (m <= 2) {
    y -= 1;
    m += 12;
  }
  const a = Math.floor(y / 100);
  const b = 2 - a + Math.floor(a / 4);
  return (
    Math.floor(365.25 * (y + 4716)) +
    Math.floor(30.6001 * (m + 1)) +
    day +
    b -
    1524.5 +
    hourUt / 24
  );
}
