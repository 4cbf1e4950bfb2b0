/**
 * Fixed-precision money helpers
 *
 * Amounts carry two fractional digits and are summed as integer minor units.
 */

export const MINOR_UNITS_PER_MAJOR = 100;

export function toMajor(amountMinor: number): number {
  return amountMinor / MINOR_UNITS_PER_MAJOR;
}

/**
 * Render minor units as a plain decimal string, e.g. 30050 -> "300.50"
 */
export function formatMinor(amountMinor: number): string {
  const sign = amountMinor < 0 ? '-' : '';
  const absolute = Math.abs(amountMinor);
  const major = Math.floor(absolute / MINOR_UNITS_PER_MAJOR);
  const minor = absolute % MINOR_UNITS_PER_MAJOR;
  return `${sign}${major}.${String(minor).padStart(2, '0')}`;
}

/**
 * Parse an unsigned decimal string into minor units, rounding half up.
 * Returns null when the text is not a plain decimal.
 */
export function parseDecimalToMinor(text: string): number | null {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(text);
  if (!match || match[1] === undefined) {
    return null;
  }

  const whole = Number(match[1]);
  const fraction = match[2] ?? '';
  const cents = Number(fraction.slice(0, 2).padEnd(2, '0'));
  const roundUp = fraction.length > 2 && Number(fraction[2]) >= 5 ? 1 : 0;
  const minor = whole * MINOR_UNITS_PER_MAJOR + cents + roundUp;

  return Number.isSafeInteger(minor) ? minor : null;
}
