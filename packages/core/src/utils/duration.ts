/**
 * Duration strings in the `<number><unit>` sequence form used by poll
 * intervals: `300ms`, `30s`, `5m`, `1h30m`, `1.5h`.
 *
 * @module utils/duration
 */

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/y;

export class DurationParseError extends Error {
  public readonly input: string;

  constructor(input: string) {
    super(`invalid duration "${input}"`);
    this.name = 'DurationParseError';
    this.input = input;
    Object.setPrototypeOf(this, DurationParseError.prototype);
  }
}

/**
 * Parses a duration string into milliseconds.
 *
 * A bare `0` is accepted; every other value needs a unit on each segment.
 *
 * @throws DurationParseError on empty, signed or malformed input
 */
export function parseDuration(input: string): number {
  const text = input.trim();
  if (text === '0') {
    return 0;
  }
  if (text === '') {
    throw new DurationParseError(input);
  }

  let total = 0;
  let index = 0;
  while (index < text.length) {
    SEGMENT.lastIndex = index;
    const match = SEGMENT.exec(text);
    const amount = match?.[1];
    const unit = match?.[2];
    const factor = unit === undefined ? undefined : UNIT_MS[unit];
    if (amount === undefined || factor === undefined) {
      throw new DurationParseError(input);
    }
    total += Number(amount) * factor;
    index = SEGMENT.lastIndex;
  }

  return total;
}

/**
 * Formats milliseconds for log output, e.g. `500ms`, `30s`, `5m0s`, `1h30m0s`.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const hours = Math.floor(ms / 3_600_000);
  const minutes = Math.floor((ms % 3_600_000) / 60_000);
  const seconds = (ms % 60_000) / 1000;

  let out = '';
  if (hours > 0) {
    out += `${hours}h`;
  }
  if (hours > 0 || minutes > 0) {
    out += `${minutes}m`;
  }
  return `${out}${seconds}s`;
}
