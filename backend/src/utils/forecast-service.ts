import { DEFAULT_FETCH_HEADERS, FetchWithTimeout } from './http-client.js';
import { LocationConfig } from './locations.js';
import { ForecastSample, ForecastUnits, normalizeOpenWeatherForecast } from './weather.js';

export const OPENWEATHER_FORECAST_URL = 'https://api.openweathermap.org/data/2.5/forecast';

export type LocationForecastResult =
  | { status: 'ok'; location: LocationConfig; samples: ForecastSample[] }
  | { status: 'failed'; location: LocationConfig; reason: string };

export class ForecastRequestError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'ForecastRequestError';
    this.statusCode = statusCode;
  }
}

export const buildOpenWeatherForecastUrl = (lat: number, lon: number, apiKey: string, units: ForecastUnits): string => {
  const params = new URLSearchParams({
    lat: String(lat),
    lon: String(lon),
    appid: apiKey,
    units,
  });
  return `${OPENWEATHER_FORECAST_URL}?${params.toString()}`;
};

interface FetchOpenWeatherForecastOptions {
  lat: number;
  lon: number;
  apiKey: string;
  units: ForecastUnits;
  fetchWithTimeout: FetchWithTimeout;
}

export const fetchOpenWeatherForecast = async ({ lat, lon, apiKey, units, fetchWithTimeout }: FetchOpenWeatherForecastOptions): Promise<unknown> => {
  const response = await fetchWithTimeout(buildOpenWeatherForecastUrl(lat, lon, apiKey, units), { headers: DEFAULT_FETCH_HEADERS });
  if (!response.ok) {
    throw new ForecastRequestError(`OpenWeather forecast failed with status ${response.status}`, response.status);
  }
  return response.json();
};

interface LoadLocationForecastsOptions {
  locations: readonly LocationConfig[];
  apiKey: string;
  units: ForecastUnits;
  fetchWithTimeout: FetchWithTimeout;
}

/**
 * Fetches and normalizes every location in order. A failure is confined to its
 * own location: it is logged and reported as a `failed` result.
 */
export const loadLocationForecasts = async ({
  locations,
  apiKey,
  units,
  fetchWithTimeout,
}: LoadLocationForecastsOptions): Promise<LocationForecastResult[]> => {
  const results: LocationForecastResult[] = [];
  for (const location of locations) {
    try {
      const payload = await fetchOpenWeatherForecast({ lat: location.lat, lon: location.lon, apiKey, units, fetchWithTimeout });
      results.push({ status: 'ok', location, samples: normalizeOpenWeatherForecast(payload, { units }) });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`[Forecast] ${location.name} fetch failed:`, reason);
      results.push({ status: 'failed', location, reason });
    }
  }
  return results;
};

export const samplesOf = (result: LocationForecastResult): ForecastSample[] => (result.status === 'ok' ? result.samples : []);
