/**
 * Backup file naming.
 *
 * `<environment>_<database>_<YYYYMMDD_HHMMSS_mmm>.sql`, timestamp in UTC.
 * The database part may itself contain underscores; the timestamp is
 * anchored to the end of the name.
 */

import { ENVIRONMENT_NAMES, type EnvironmentName } from "../config/index.js";

export const BACKUP_EXTENSION = ".sql";

const BACKUP_NAME_PATTERN = new RegExp(
  `^(${ENVIRONMENT_NAMES.join("|")})_(.+)_(\\d{4})(\\d{2})(\\d{2})_(\\d{2})(\\d{2})(\\d{2})_(\\d{3})\\.sql$`
);

/**
 * Fields encoded in a backup file name
 */
export interface ParsedBackupName {
  environment: EnvironmentName;
  database: string;
  createdAt: Date;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Format a time as `YYYYMMDD_HHMMSS_mmm` (UTC)
 */
export function formatBackupTimestamp(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}_${pad(date.getUTCMilliseconds(), 3)}`;
}

export function backupFileName(environment: EnvironmentName, database: string, date: Date): string {
  return `${environment}_${database}_${formatBackupTimestamp(date)}${BACKUP_EXTENSION}`;
}

/**
 * Parse a backup file name
 *
 * @returns Parsed fields, or null when the name is not a backup file name
 */
export function parseBackupFileName(name: string): ParsedBackupName | null {
  const match = BACKUP_NAME_PATTERN.exec(name);
  if (!match) {
    return null;
  }

  const [, environment, database, year, month, day, hours, minutes, seconds, millis] = match;
  const found = ENVIRONMENT_NAMES.find((candidate) => candidate === environment);
  if (
    found === undefined ||
    database === undefined ||
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hours === undefined ||
    minutes === undefined ||
    seconds === undefined ||
    millis === undefined
  ) {
    return null;
  }

  const createdAt = new Date(
    Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hours),
      Number(minutes),
      Number(seconds),
      Number(millis)
    )
  );
  // Date.UTC rolls impossible dates over (month 13, day 32)
  const stamp = `${year}${month}${day}_${hours}${minutes}${seconds}_${millis}`;
  if (Number.isNaN(createdAt.getTime()) || formatBackupTimestamp(createdAt) !== stamp) {
    return null;
  }

  return { environment: found, database, createdAt };
}
