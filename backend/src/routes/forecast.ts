import { Express, Request, Response } from 'express';
import { FetchWithTimeout } from '../utils/http-client.js';
import { LocationConfig } from '../utils/locations.js';
import { LocationForecastResult, loadLocationForecasts } from '../utils/forecast-service.js';
import { buildForecastDays } from '../utils/scoring.js';
import { weekdayLabel } from '../utils/time.js';
import { ForecastUnits, mmToInches } from '../utils/weather.js';

export const buildLocationSummary = (result: LocationForecastResult) => {
  const base = {
    name: result.location.name,
    lat: result.location.lat,
    lon: result.location.lon,
    status: result.status,
  };
  if (result.status === 'failed') {
    return { ...base, error: result.reason, sampleCount: 0, days: [] };
  }
  return {
    ...base,
    sampleCount: result.samples.length,
    days: buildForecastDays(result.samples).map((day) => ({
      ...day,
      weekday: weekdayLabel(day.date),
      rainIn: Number(mmToInches(day.maxPrecipMm).toFixed(2)),
      favorability: Number(day.favorability.toFixed(3)),
    })),
  };
};

interface RegisterForecastRouteOptions {
  app: Express;
  locations: readonly LocationConfig[];
  apiKey: string | null;
  units: ForecastUnits;
  fetchWithTimeout: FetchWithTimeout;
}

export const registerForecastRoute = ({ app, locations, apiKey, units, fetchWithTimeout }: RegisterForecastRouteOptions) => {
  app.get('/api/forecast', async (_req: Request, res: Response) => {
    if (!apiKey) {
      return res.status(500).json({ error: 'OPENWEATHER_API_KEY is not configured.' });
    }

    try {
      const results = await loadLocationForecasts({ locations, apiKey, units, fetchWithTimeout });
      return res.status(200).json({
        generatedAt: new Date().toISOString(),
        units: 'imperial',
        partialData: results.some((result) => result.status === 'failed'),
        locations: results.map(buildLocationSummary),
      });
    } catch (error) {
      console.error('[Forecast] summary failed:', error);
      return res.status(500).json({ error: 'Unable to build forecast summary.' });
    }
  });
};
