import { format, isValid, parse } from 'date-fns';

const ID_FORMAT = 'yyyyMMdd-HHmmss';
const ID_PATTERN = /^\d{8}-\d{6}$/;

/**
 * Snapshot identifier for a point in time, in local time: "20241121-093000".
 * Lexicographic order of identifiers is chronological order.
 */
export function formatSnapshotId(date: Date): string {
  return format(date, ID_FORMAT);
}

/**
 * Parse a snapshot identifier back to its timestamp.
 * Returns null for aliases, stray keys and impossible dates.
 */
export function parseSnapshotId(id: string): Date | null {
  if (!ID_PATTERN.test(id)) {
    return null;
  }

  const date = parse(id, ID_FORMAT, new Date(0));
  if (!isValid(date)) {
    return null;
  }

  // date-fns rolls some out-of-range fields over; reject those
  return formatSnapshotId(date) === id ? date : null;
}

export function isSnapshotId(id: string): boolean {
  return parseSnapshotId(id) !== null;
}
