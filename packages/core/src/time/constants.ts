/**
 * Time constants shared by the calendar helpers and the performance math.
 */

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/** Average calendar year, used to turn elapsed days into years. */
export const DAYS_PER_YEAR = 365.25;

/** Trading days per year, used to annualize daily statistics. */
export const TRADING_DAYS_PER_YEAR = 252;
