/**
 * Nanoseconds per unit, keyed by every accepted spelling
 */
const UNIT_NANOS = new Map<string, number>([
  ['ns', 1],
  ['nsec', 1],
  ['us', 1e3],
  ['usec', 1e3],
  ['ms', 1e6],
  ['msec', 1e6],
  ['s', 1e9],
  ['sec', 1e9],
  ['secs', 1e9],
  ['second', 1e9],
  ['seconds', 1e9],
  ['m', 60e9],
  ['min', 60e9],
  ['mins', 60e9],
  ['minute', 60e9],
  ['minutes', 60e9],
  ['h', 3600e9],
  ['hr', 3600e9],
  ['hrs', 3600e9],
  ['hour', 3600e9],
  ['hours', 3600e9],
  ['d', 86400e9],
  ['day', 86400e9],
  ['days', 86400e9],
]);

/** Largest unit first, as written by formatDuration */
const CANONICAL_UNITS: ReadonlyArray<[unit: string, nanos: number]> = [
  ['d', 86400e9],
  ['h', 3600e9],
  ['m', 60e9],
  ['s', 1e9],
  ['ms', 1e6],
  ['us', 1e3],
  ['ns', 1],
];

const COMPONENT = /(\d+)\s*([a-z]+)\s*/gy;

/**
 * Parse a duration string such as "2s", "500ms" or "1m 30s" into seconds.
 * @returns seconds, or null when the text is not a duration or overflows
 */
export function parseDuration(text: string): number | null {
  const source = text.trim().toLowerCase();
  if (source === '') return null;

  let nanos = 0;
  COMPONENT.lastIndex = 0;
  while (COMPONENT.lastIndex < source.length) {
    const match = COMPONENT.exec(source);
    if (!match) return null;

    const unit = UNIT_NANOS.get(match[2]);
    if (unit === undefined) return null;
    nanos += Number(match[1]) * unit;
  }

  const seconds = nanos / 1e9;
  return Number.isFinite(seconds) ? seconds : null;
}

/**
 * Format seconds as a canonical duration string ("1m 30s", "500ms", "0s").
 * Sub-nanosecond precision is rounded away.
 * @throws RangeError for negative or non-finite input
 */
export function formatDuration(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new RangeError(`Invalid duration: ${seconds}. Durations must be finite and non-negative.`);
  }

  let remaining = Math.round(seconds * 1e9);
  if (remaining === 0) return '0s';

  const parts: string[] = [];
  for (const [unit, nanos] of CANONICAL_UNITS) {
    const count = Math.floor(remaining / nanos);
    if (count > 0) {
      parts.push(`${count}${unit}`);
      remaining -= count * nanos;
    }
  }
  return parts.join(' ');
}
