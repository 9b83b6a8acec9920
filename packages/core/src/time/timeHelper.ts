import { DateTime, Duration } from "luxon";
import { UNKNOWN } from "../types/attendance";

const UTC_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
const UTC_PREFIX_LENGTH = 19;

export const DEFAULT_TIMEZONE = "America/Los_Angeles";
export const DEFAULT_TIMEZONE_LABEL = "PST";

export interface TimeHelperOptions {
  zone?: string;
  /** Suffix printed after local times, e.g. "PST". Fixed regardless of DST. */
  label?: string;
}

export interface TimeHelper {
  readonly zone: string;
  readonly label: string;
  toLocalDateTime(utc: string): string;
  toLocalTimeOnly(utc: string): string;
  toLocalDate(utc: string): string;
  formatNow(format: string, now?: DateTime): string;
}

/**
 * Parses the "yyyy-MM-ddTHH:mm:ss" prefix of a provider timestamp as UTC.
 * Trailing "Z" or fractional seconds are ignored.
 */
export function parseUtcTimestamp(utc: string): DateTime | null {
  if (!utc) return null;
  const parsed = DateTime.fromFormat(utc.slice(0, UTC_PREFIX_LENGTH), UTC_FORMAT, { zone: "utc" });
  return parsed.isValid ? parsed : null;
}

function toZone(utc: string, zone: string): DateTime | null {
  const parsed = parseUtcTimestamp(utc);
  if (!parsed) return null;
  const local = parsed.setZone(zone);
  return local.isValid ? local : null;
}

export function createTimeHelper(options: TimeHelperOptions = {}): TimeHelper {
  const zone = options.zone ?? DEFAULT_TIMEZONE;
  const label = options.label ?? DEFAULT_TIMEZONE_LABEL;

  const toLocalDateTime = (utc: string): string => {
    if (!utc || utc === UNKNOWN) return UNKNOWN;
    const local = toZone(utc, zone);
    if (!local) return utc;
    return `${local.toFormat("yyyy-MM-dd HH:mm")} ${label}`;
  };

  const toLocalTimeOnly = (utc: string): string => {
    if (!utc || utc === UNKNOWN) return UNKNOWN;
    const local = toZone(utc, zone);
    if (!local) return utc.length > 5 ? utc.slice(0, 5) : utc;
    return local.toFormat("HH:mm");
  };

  return {
    zone,
    label,
    toLocalDateTime,
    toLocalTimeOnly,
    toLocalDate: (utc) => (utc ? toLocalDateTime(utc).slice(0, 10) : UNKNOWN),
    formatNow: (format, now = DateTime.now()) => {
      const local = now.setZone(zone);
      return (local.isValid ? local : now).toFormat(format);
    },
  };
}

function durationFor(suffix: string, amount: number): Duration | null {
  switch (suffix) {
    case "h":
      return Duration.fromObject({ hours: amount });
    case "m":
      return Duration.fromObject({ minutes: amount });
    case "d":
      return Duration.fromObject({ days: amount });
    default:
      return null;
  }
}

const INTEGER = /^[+-]?\d+$/;

/**
 * "2h", "30m", "3d" or a bare day count. Anything unparseable, including an
 * empty string, means one day.
 */
export function parseLookback(input: string): Duration {
  const value = input.trim().toLowerCase();
  const oneDay = Duration.fromObject({ days: 1 });
  if (!value) return oneDay;

  const amount = value.slice(0, -1).trim();
  if (INTEGER.test(amount)) {
    const withUnit = durationFor(value.slice(-1), parseInt(amount, 10));
    if (withUnit) return withUnit;
  }

  if (INTEGER.test(value)) {
    return Duration.fromObject({ days: parseInt(value, 10) });
  }

  return oneDay;
}

export function describeLookback(window: Duration): string {
  return window.as("hours").toFixed(1);
}
