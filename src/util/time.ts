export const nowIso = () => new Date().toISOString();

export const EPOCH_ISO = "1970-01-01T00:00:00.000Z";

export type TimestampInput = string | number | Date;

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

const EPOCH_SECONDS_PATTERN = /^\d{1,12}$/;

// Stored timestamps are compared as text, which only orders correctly for four-digit years.
const toCanonical = (date: Date, input: TimestampInput) => {
  const year = date.getUTCFullYear();
  if (Number.isNaN(date.getTime()) || year < 0 || year > 9999) {
    throw new RangeError(`Unsupported timestamp: ${String(input)}`);
  }
  return date.toISOString();
};

const fromEpochSeconds = (seconds: number) => {
  if (!Number.isFinite(seconds)) {
    throw new RangeError(`Unsupported timestamp: ${seconds}`);
  }
  return toCanonical(new Date(seconds * 1000), seconds);
};

const offsetMinutes = (offset: string) => {
  if (offset.toUpperCase() === "Z") {
    return 0;
  }
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) {
    throw new RangeError(`Unsupported timestamp offset: ${offset}`);
  }
  return sign * (hours * 60 + minutes);
};

/**
 * Normalizes a timestamp to canonical UTC ISO-8601 (`YYYY-MM-DDTHH:mm:ss.sssZ`).
 *
 * Accepted encodings: `Date`, epoch seconds (number or digit string), and ISO-8601
 * dates with a `T` or space separator, optional seconds and fraction, and an optional
 * `Z` or `±HH:MM` offset. Values without an offset are read as UTC. Years outside
 * 0000-9999 are rejected.
 */
export const parseTimestamp = (input: TimestampInput): string => {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new RangeError("Unsupported timestamp: invalid Date");
    }
    return toCanonical(input, input);
  }
  if (typeof input === "number") {
    return fromEpochSeconds(input);
  }

  const value = input.trim();
  if (EPOCH_SECONDS_PATTERN.test(value)) {
    return fromEpochSeconds(Number(value));
  }

  const match = ISO_PATTERN.exec(value);
  if (!match) {
    throw new RangeError(`Unsupported timestamp: ${input}`);
  }
  const [, year, month, day, hour = "0", minute = "0", second = "0", fraction = "", offset = "Z"] =
    match;
  const parts = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second)
  };
  const millis = Number(fraction.slice(0, 3).padEnd(3, "0"));
  const local = new Date(
    Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second, millis)
  );
  const valid =
    local.getUTCFullYear() === parts.year &&
    local.getUTCMonth() === parts.month - 1 &&
    local.getUTCDate() === parts.day &&
    local.getUTCHours() === parts.hour &&
    local.getUTCMinutes() === parts.minute &&
    local.getUTCSeconds() === parts.second;
  if (!valid) {
    throw new RangeError(`Unsupported timestamp: ${input}`);
  }

  return toCanonical(new Date(local.getTime() - offsetMinutes(offset) * 60_000), input);
};

export const isValidTimeZone = (timeZone: string) => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
};

export const formatForDisplay = (iso: string, timeZone: string) => {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
    timeZoneName: "short"
  });
  const parts = new Map(
    formatter.formatToParts(new Date(iso)).map((part) => [part.type, part.value])
  );
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.get(type) ?? "";
  return `${get("year")}-${get("month")}-${get("day")} ${get("hour")}:${get("minute")}:${get(
    "second"
  )} ${get("timeZoneName")}`;
};
