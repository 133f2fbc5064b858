import { z } from "zod";

const rfc3339 = z.string().datetime({ offset: true });

const PARTS = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-]\d{2}(?::?\d{2})?)$/;
const OFFSET = /^([+-])(\d{2}):?(\d{2})?$/;

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

function offsetMinutes(zone: string): number | null {
  if (zone === "Z") return 0;
  const match = OFFSET.exec(zone);
  if (!match) return null;
  const hours = Number(match[2]);
  const minutes = Number(match[3] ?? "0");
  if (hours > 23 || minutes > 59) return null;
  return (match[1] === "-" ? -1 : 1) * (hours * 60 + minutes);
}

// Returns the same instant written in UTC, keeping every fractional digit of
// the input, or null when the value is not a real RFC3339 timestamp or its
// UTC year falls outside 0000..9999.
export function toUtcTimestamp(value: string): string | null {
  if (!rfc3339.safeParse(value).success) return null;
  const match = PARTS.exec(value);
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const fraction = match[7] ?? "";
  const offset = offsetMinutes(match[8]);
  if (offset === null) return null;

  const wall = new Date(0);
  wall.setUTCFullYear(year, month - 1, day);
  wall.setUTCHours(hour, minute, second, 0);
  const roundTrips =
    wall.getUTCFullYear() === year &&
    wall.getUTCMonth() === month - 1 &&
    wall.getUTCDate() === day &&
    wall.getUTCHours() === hour &&
    wall.getUTCMinutes() === minute &&
    wall.getUTCSeconds() === second;
  if (!roundTrips) return null;

  const utc = new Date(wall.getTime() - offset * 60_000);
  const utcYear = utc.getUTCFullYear();
  if (utcYear < 0 || utcYear > 9999) return null;

  return (
    `${pad(utcYear, 4)}-${pad(utc.getUTCMonth() + 1)}-${pad(utc.getUTCDate())}` +
    `T${pad(utc.getUTCHours())}:${pad(utc.getUTCMinutes())}:${pad(utc.getUTCSeconds())}${fraction}Z`
  );
}
