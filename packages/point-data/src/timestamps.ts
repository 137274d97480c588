const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})[T ]/;
const EXPLICIT_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

export type DateEdge = 'start' | 'end';

// Date.UTC rolls 2021-02-30 over into March; only real calendar days pass.
function calendarDay(year: string, month: string, day: string): number | null {
  const y = Number(year);
  const m = Number(month) - 1;
  const d = Number(day);
  const start = Date.UTC(y, m, d);
  const check = new Date(start);
  if (check.getUTCFullYear() !== y || check.getUTCMonth() !== m || check.getUTCDate() !== d) {
    return null;
  }
  return start;
}

/**
 * Converts an archive timestamp or query bound to epoch milliseconds.
 *
 * Timestamps without a zone are read as wall-clock values in the series' own
 * convention and compared as such; no zone conversion happens here. A bare
 * date covers its whole day, so `edge = 'end'` yields the last millisecond of
 * that day.
 */
export function toEpochMillis(value: string, edge: DateEdge = 'start'): number | null {
  const trimmed = value.trim();
  const dateOnly = DATE_ONLY.exec(trimmed);
  if (dateOnly) {
    const start = calendarDay(dateOnly[1], dateOnly[2], dateOnly[3]);
    if (start === null) {
      return null;
    }
    return edge === 'end' ? start + DAY_MS - 1 : start;
  }

  const datePrefix = DATE_PREFIX.exec(trimmed);
  if (!datePrefix || calendarDay(datePrefix[1], datePrefix[2], datePrefix[3]) === null) {
    return null;
  }
  const normalized = trimmed.replace(' ', 'T');
  const parsed = Date.parse(EXPLICIT_ZONE.test(normalized) ? normalized : `${normalized}Z`);
  return Number.isNaN(parsed) ? null : parsed;
}

export interface TimeWindow {
  start: number | null;
  end: number | null;
}

export function buildTimeWindow(dateStart?: string, dateEnd?: string): TimeWindow {
  return {
    start: dateStart === undefined ? null : toEpochMillis(dateStart, 'start'),
    end: dateEnd === undefined ? null : toEpochMillis(dateEnd, 'end')
  };
}

export function isWithinWindow(timestamp: number, window: TimeWindow): boolean {
  if (window.start !== null && timestamp < window.start) {
    return false;
  }
  if (window.end !== null && timestamp > window.end) {
    return false;
  }
  return true;
}
