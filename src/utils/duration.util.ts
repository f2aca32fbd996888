import { InvalidWindowError } from '../errors/log-window.error.js';
import type { DurationUnit } from '../types/log.types.js';

/**
 * Seconds per duration unit.
 */
export const UNIT_SECONDS: Record<DurationUnit, number> = {
  m: 60,
  h: 3600,
  d: 86400,
  w: 604800,
};

/**
 * Window presets offered by the CloudWatch console buttons.
 */
export const PRESET_WINDOWS: readonly string[] = [
  '5m', '10m', '15m', '30m', '45m',
  '1h', '2h', '3h', '6h', '8h', '12h',
  '1d', '2d', '3d', '4d', '5d', '6d',
  '1w', '2w', '3w', '4w',
];

function isDurationUnit(value: string): value is DurationUnit {
  return Object.prototype.hasOwnProperty.call(UNIT_SECONDS, value);
}

/**
 * Parse a duration token such as "5m" or "2w" into seconds.
 *
 * @throws InvalidWindowError for an unknown unit or a count that is not a positive integer
 */
export function parseDuration(token: string): number {
  const trimmed = token.trim();
  const unit = trimmed.slice(-1);
  const count = trimmed.slice(0, -1);

  if (!isDurationUnit(unit)) {
    throw new InvalidWindowError({
      message: `Unsupported window: ${token}`,
      metadata: { token },
    });
  }

  if (!/^\d+$/.test(count) || Number(count) <= 0) {
    throw new InvalidWindowError({
      message: `Unsupported window: ${token} (expected a positive whole number before "${unit}")`,
      metadata: { token },
    });
  }

  return Number(count) * UNIT_SECONDS[unit];
}
