import type { DateWindow } from '../../types/index.js';

export type Instant = Date | string | number;

/**
 * Converts an instant to UTC epoch milliseconds.
 * ISO strings without an offset are read by `Date.parse`, which treats
 * date-time forms as local time; callers pass `Z`-suffixed values.
 */
export function toEpochMs(instant: Instant): number | null {
  const ms = instant instanceof Date ? instant.getTime() : typeof instant === 'number' ? instant : Date.parse(instant);
  return Number.isFinite(ms) ? ms : null;
}

export function isWithinWindow(instant: Instant, window: DateWindow): boolean {
  const ms = toEpochMs(instant);
  if (ms === null) return false;
  return ms >= window.start.getTime() && ms <= window.end.getTime();
}

export function filterByWindow<T>(
  items: readonly T[],
  instantOf: (item: T) => Instant | undefined,
  window: DateWindow
): T[] {
  return items.filter((item) => {
    const instant = instantOf(item);
    return instant !== undefined && isWithinWindow(instant, window);
  });
}
