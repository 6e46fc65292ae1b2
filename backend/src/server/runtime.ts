import dotenv from 'dotenv';
import { ForecastUnits } from '../utils/weather.js';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const parseForecastUnits = (rawValue: string | undefined): ForecastUnits =>
  String(rawValue || '').trim().toLowerCase() === 'imperial' ? 'imperial' : 'metric';

export const PORT = process.env.PORT || 3001;
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 9000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);

export const OPENWEATHER_API_KEY = (process.env.OPENWEATHER_API_KEY || '').trim() || null;
export const FORECAST_UNITS = parseForecastUnits(process.env.FORECAST_UNITS);
