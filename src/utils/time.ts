const MS_PER_HOUR = 60 * 60 * 1000;

export function hoursToMs(hours: number): number {
  return hours * MS_PER_HOUR;
}

/** Reduces an ISO timestamp to its `YYYY-MM-DD` day; '' when absent or unparseable. */
export function toIsoDay(value: string | undefined | null): string {
  if (!value) {
    return '';
  }

  // keep the calendar day as written, whatever the offset
  const day = /^\d{4}-\d{2}-\d{2}/.exec(value);
  if (day) {
    return day[0];
  }

  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    return '';
  }

  return new Date(parsed).toISOString().slice(0, 10);
}

export function todayIsoDay(now: number = Date.now()): string {
  return new Date(now).toISOString().slice(0, 10);
}
