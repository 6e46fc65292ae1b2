import { dateKeyFromLocalIso, parseIsoClockMinutes } from './time.js';
import { ForecastSample } from './weather.js';

export const ACTIVITY_WINDOW_START_MINUTES = 9 * 60;
export const ACTIVITY_WINDOW_END_MINUTES = 16 * 60;
export const COMPLETE_DAY_MIN_MINUTES = 12 * 60;

export interface DailyStats {
  date: string;
  /** `null` when the day is incomplete. */
  maxTempF: number | null;
  /** `null` when the day is incomplete. */
  maxHumidity: number | null;
  maxPrecipMm: number;
  isComplete: boolean;
}

const clockMinutes = (sample: ForecastSample): number => parseIsoClockMinutes(sample.time) ?? 0;

export const isWithinActivityWindow = (sample: ForecastSample): boolean => {
  const minutes = clockMinutes(sample);
  return minutes >= ACTIVITY_WINDOW_START_MINUTES && minutes < ACTIVITY_WINDOW_END_MINUTES;
};

const maxOf = (values: number[]): number => (values.length ? Math.max(...values) : 0);

export const groupSamplesByDay = (samples: readonly ForecastSample[]): { date: string; samples: ForecastSample[] }[] => {
  const byDate = new Map<string, ForecastSample[]>();
  samples.forEach((sample) => {
    const date = dateKeyFromLocalIso(sample.time);
    const bucket = byDate.get(date);
    if (bucket) {
      bucket.push(sample);
    } else {
      byDate.set(date, [sample]);
    }
  });
  return [...byDate.keys()]
    .sort()
    .map((date) => ({ date, samples: byDate.get(date) ?? [] }));
};

export const summarizeDay = (date: string, daySamples: readonly ForecastSample[]): DailyStats => {
  const isComplete = daySamples.some((sample) => clockMinutes(sample) >= COMPLETE_DAY_MIN_MINUTES);
  const maxPrecipMm = Math.max(0, ...daySamples.map((sample) => sample.precipMm));
  if (!isComplete) {
    return { date, maxTempF: null, maxHumidity: null, maxPrecipMm, isComplete };
  }

  const windowSamples = daySamples.filter(isWithinActivityWindow);
  const basis = windowSamples.length ? windowSamples : daySamples;
  return {
    date,
    maxTempF: maxOf(basis.map((sample) => sample.tempF)),
    maxHumidity: maxOf(basis.map((sample) => sample.humidity)),
    maxPrecipMm,
    isComplete,
  };
};

/**
 * One entry per local calendar day present in `samples`, ascending by date.
 * Temperature and humidity maxima come from the [09:00, 16:00) window when the
 * day has samples there; precipitation always uses the whole day.
 */
export const aggregateDailyStats = (samples: readonly ForecastSample[]): DailyStats[] =>
  groupSamplesByDay(samples).map(({ date, samples: daySamples }) => summarizeDay(date, daySamples));
