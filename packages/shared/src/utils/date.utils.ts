// ============================================================================
// Hospital Portal Gateway: Date Utilities
// ============================================================================

/**
 * Validates a portal date expressed as an 8-digit integer (YYYYMMDD).
 *
 * The portal takes calendar dates in this packed numeric form for every
 * range query. The value must name a day that exists in the Gregorian
 * calendar, so 20240230 is rejected while 20240229 is accepted.
 */
export function validateYmdDate(value: number): {
  valid: boolean;
  error?: string;
} {
  if (!Number.isInteger(value) || value < 10000101 || value > 99991231) {
    return { valid: false, error: 'Date must be an 8-digit YYYYMMDD number' };
  }

  const year = Math.floor(value / 10000);
  const month = Math.floor((value % 10000) / 100);
  const day = value % 100;

  if (month < 1 || month > 12) {
    return { valid: false, error: 'Date has an invalid month' };
  }

  // Day 0 of the following month is the last day of this one
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day < 1 || day > daysInMonth) {
    return { valid: false, error: 'Date has an invalid day' };
  }

  return { valid: true };
}
