import { LocationForecastResult } from '../src/utils/forecast-service.js';
import { LocationConfig } from '../src/utils/locations.js';
import { ForecastSample } from '../src/utils/weather.js';

export const sampleAt = (time: string, tempF: number, humidity: number, precipMm: number = 0): ForecastSample => ({
  time,
  localMs: Date.parse(`${time}:00Z`),
  tempF,
  humidity,
  precipMm,
});

export const testLocation = (name: string): LocationConfig => ({ name, lat: 44, lon: -72 });

export const okResult = (name: string, samples: ForecastSample[]): LocationForecastResult => ({
  status: 'ok',
  location: testLocation(name),
  samples,
});

export const failedResult = (name: string, reason: string = 'boom'): LocationForecastResult => ({
  status: 'failed',
  location: testLocation(name),
  reason,
});

// One complete day with no rain: 10:00, 13:00 and 18:00.
export const scenarioADay = (date: string = '2026-10-20'): ForecastSample[] => [
  sampleAt(`${date}T10:00`, 68, 55),
  sampleAt(`${date}T13:00`, 70, 50),
  sampleAt(`${date}T18:00`, 72, 48),
];
