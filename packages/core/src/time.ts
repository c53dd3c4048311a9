const MS_PER_MINUTE = 60_000;

const RFC3339_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[Tt ]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

/**
 * Parses an RFC 3339 timestamp. Feeds routinely omit one of arrival/departure,
 * so a missing or malformed value is `null`, never an error.
 */
const daysInMonth = (year: number, month: number) => new Date(Date.UTC(year, month, 0)).getUTCDate();

export const parseTimestamp = (value: string | null | undefined): Date | null => {
  const match = value ? RFC3339_PATTERN.exec(value) : null;
  if (!value || !match) return null;
  // Date.parse rolls impossible days over into the next month.
  const [year, month, day] = [match[1], match[2], match[3]].map(Number);
  if (!year || !month || !day || month > 12 || day > daysInMonth(year, month)) return null;
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? new Date(parsed) : null;
};

/** Whole minutes from `now` to `time`, truncated toward zero. */
export const minutesUntil = (time: Date, now: Date): number => {
  const minutes = Math.trunc((time.getTime() - now.getTime()) / MS_PER_MINUTE);
  return minutes === 0 ? 0 : minutes;
};

export const addMinutes = (time: Date, minutes: number): Date =>
  new Date(time.getTime() + minutes * MS_PER_MINUTE);

const pad2 = (value: number) => String(value).padStart(2, "0");

/** Local wall-clock `HH:MM`, or `HH:MM:SS` with seconds. */
export const formatClock = (time: Date, withSeconds = false): string => {
  const base = `${pad2(time.getHours())}:${pad2(time.getMinutes())}`;
  return withSeconds ? `${base}:${pad2(time.getSeconds())}` : base;
};
