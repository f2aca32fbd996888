import { CURRENT } from '../config.js';
import { parseDuration } from '../utils/duration.util.js';
import { endOfDayUtcMs, formatCalendarDate, resolveCalendarDate } from '../utils/calendar.util.js';
import type { ResolvedWindow, WindowSelection } from '../types/log.types.js';

export function isAbsoluteSelection(selection: WindowSelection): boolean {
  return (
    selection.specificMonth.trim().toLowerCase() !== CURRENT ||
    selection.specificDay.trim().toLowerCase() !== CURRENT
  );
}

/**
 * Resolve the query window for a selection at `nowMs`.
 *
 * Relative mode ends at now. Absolute mode ends at 23:59:59 UTC of the chosen
 * date in the current year, clamped to now. In both modes the window length
 * is the duration token, and the start never goes below the epoch.
 */
export function resolveWindow(selection: WindowSelection, nowMs: number): ResolvedWindow {
  const durationMs = parseDuration(selection.relativeWindow) * 1000;
  const token = selection.relativeWindow.trim();

  if (!isAbsoluteSelection(selection)) {
    return {
      mode: 'relative',
      startMs: Math.max(0, nowMs - durationMs),
      endMs: nowMs,
      description: `last ${token}`,
    };
  }

  const date = resolveCalendarDate(selection.specificMonth, selection.specificDay, nowMs);
  const endMs = Math.min(endOfDayUtcMs(date), nowMs);

  return {
    mode: 'absolute',
    startMs: Math.max(0, endMs - durationMs),
    endMs,
    description: `${token} window on ${formatCalendarDate(date)}`,
  };
}
