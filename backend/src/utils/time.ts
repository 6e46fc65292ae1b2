export const MS_PER_HOUR = 60 * 60 * 1000;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

const WEEKDAY_LABELS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * Shifts a provider epoch (seconds, UTC) into the location's wall clock. The
 * returned milliseconds encode local time as if it were UTC, so every
 * calendar computation below uses the UTC getters.
 */
export const toLocalWallClockMs = (epochSeconds: number, utcOffsetSeconds: number = 0): number =>
  (epochSeconds + utcOffsetSeconds) * 1000;

export const formatLocalIso = (localMs: number): string => {
  const date = new Date(localMs);
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}T${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}`;
};

// YYYY-MM-DD
export const dateKeyFromLocalIso = (localIso: string): string => localIso.slice(0, 10);

export const parseIsoClockMinutes = (isoValue: string | null | undefined): number | null => {
  if (typeof isoValue !== 'string') {
    return null;
  }
  const match = isoValue.trim().match(/T(\d{2}):(\d{2})/);
  if (!match) {
    return null;
  }
  return Number(match[1]) * 60 + Number(match[2]);
};

export const startOfDayMs = (dateKey: string): number => {
  const match = dateKey.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    return Number.NaN;
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
};

export const weekdayLabel = (dateKey: string): string => {
  const dayStart = startOfDayMs(dateKey);
  return Number.isFinite(dayStart) ? WEEKDAY_LABELS[new Date(dayStart).getUTCDay()] : '';
};

// "Mon 10/19"
export const axisDateLabel = (localMs: number): string => {
  const date = new Date(localMs);
  return `${WEEKDAY_LABELS[date.getUTCDay()]} ${pad2(date.getUTCMonth() + 1)}/${pad2(date.getUTCDate())}`;
};
