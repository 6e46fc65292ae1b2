import { formatLocalIso, toLocalWallClockMs } from './time.js';

export const MM_PER_INCH = 25.4;

export type ForecastUnits = 'metric' | 'imperial';

export interface ForecastSample {
  /** Location-local wall clock, `YYYY-MM-DDTHH:mm`. */
  time: string;
  /** The same wall clock encoded as UTC epoch milliseconds. */
  localMs: number;
  tempF: number;
  humidity: number;
  precipMm: number;
}

export class ForecastParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ForecastParseError';
  }
}

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const parseFiniteNumber = (value: unknown): number | null => {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const numeric = Number(value);
  return Number.isFinite(numeric) ? numeric : null;
};

export const celsiusToF = (valueC: number): number => valueC * 9 / 5 + 32;

export const mmToInches = (mm: number): number => mm / MM_PER_INCH;

export const extractPrecipitationMm = (rainField: unknown): number => {
  if (!isRecord(rainField)) {
    return 0;
  }
  const threeHour = parseFiniteNumber(rainField['3h']);
  if (threeHour !== null) {
    return threeHour;
  }
  return parseFiniteNumber(rainField['1h']) ?? 0;
};

interface NormalizeForecastOptions {
  units?: ForecastUnits;
}

/**
 * Converts an OpenWeather `/forecast` payload into samples in °F and location
 * local time. Entries keep their order unless the provider sent them out of
 * order, in which case they are stably sorted by time.
 */
export const normalizeOpenWeatherForecast = (payload: unknown, { units = 'metric' }: NormalizeForecastOptions = {}): ForecastSample[] => {
  if (!isRecord(payload) || !Array.isArray(payload.list)) {
    throw new ForecastParseError('Forecast response did not include a list of entries.');
  }
  const city = isRecord(payload.city) ? payload.city : null;
  // One offset for the whole horizon: samples after a DST change inside the
  // five days land an hour off on the wall clock.
  const utcOffsetSeconds = parseFiniteNumber(city?.timezone) ?? 0;

  const samples = payload.list.map((entry: unknown, index: number): ForecastSample => {
    if (!isRecord(entry)) {
      throw new ForecastParseError(`Forecast entry ${index} is not an object.`);
    }
    const epochSeconds = parseFiniteNumber(entry.dt);
    const main = isRecord(entry.main) ? entry.main : null;
    const temp = parseFiniteNumber(main?.temp);
    const humidity = parseFiniteNumber(main?.humidity);
    if (epochSeconds === null || temp === null || humidity === null) {
      throw new ForecastParseError(`Forecast entry ${index} is missing dt, main.temp or main.humidity.`);
    }

    const localMs = toLocalWallClockMs(epochSeconds, utcOffsetSeconds);
    return {
      time: formatLocalIso(localMs),
      localMs,
      tempF: units === 'metric' ? celsiusToF(temp) : temp,
      humidity,
      precipMm: extractPrecipitationMm(entry.rain),
    };
  });

  const isOrdered = samples.every((sample, idx) => idx === 0 || samples[idx - 1].localMs <= sample.localMs);
  return isOrdered ? samples : [...samples].sort((a, b) => a.localMs - b.localMs);
};
