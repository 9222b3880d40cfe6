/**
 * Archive naming utilities
 *
 * Archives are named `<name>-YYYY-MM-DD-HHMMSS.tar.gz.age`, timestamp in local time.
 */

import type { ParsedArchiveName } from "../types";

export const ARCHIVE_SUFFIX = ".tar.gz.age";

// Pattern: name-YYYY-MM-DD-HHMMSS.tar.gz.age
export const ARCHIVE_NAME_PATTERN = /^(.+)-(\d{4})-(\d{2})-(\d{2})-(\d{2})(\d{2})(\d{2})\.tar\.gz\.age$/;

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Format a local-time timestamp as `YYYY-MM-DD-HHMMSS`.
 */
export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

export function formatArchiveName(name: string, date: Date): string {
  return formatArchiveNameFromTimestamp(name, formatTimestamp(date));
}

export function formatArchiveNameFromTimestamp(name: string, timestamp: string): string {
  return `${name}-${timestamp}${ARCHIVE_SUFFIX}`;
}

export function isArchiveFileName(fileName: string): boolean {
  return fileName.endsWith(ARCHIVE_SUFFIX) && fileName.length > ARCHIVE_SUFFIX.length;
}

/**
 * Parse an archive file name back into its name and local-time instant.
 * Returns null for anything that does not carry a valid timestamp.
 */
export function parseArchiveName(fileName: string): ParsedArchiveName | null {
  const match = ARCHIVE_NAME_PATTERN.exec(fileName);
  if (!match) return null;

  const [, name, y, mo, d, h, mi, s] = match;
  if (!name || !y || !mo || !d || !h || !mi || !s) return null;

  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hours = Number(h);
  const minutes = Number(mi);
  const seconds = Number(s);

  if (month < 1 || month > 12 || day < 1 || hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  const date = new Date(year, month - 1, day, hours, minutes, seconds);

  // Date rolls Feb 30 over into March; the calendar day must survive unchanged.
  // Hours are not compared so a time inside a DST gap still parses.
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }

  return {
    name,
    timestamp: `${y}-${mo}-${d}-${h}${mi}${s}`,
    date,
    epochSeconds: Math.floor(date.getTime() / 1000),
  };
}
