import {
  ForecastRequestError,
  buildOpenWeatherForecastUrl,
  fetchOpenWeatherForecast,
  loadLocationForecasts,
} from '../src/utils/forecast-service.js';
import { FetchWithTimeout } from '../src/utils/http-client.js';
import { testLocation } from './fixtures.js';

const forecastPayload = {
  city: { timezone: 0 },
  list: [
    { dt: Date.parse('2026-10-20T12:00:00Z') / 1000, main: { temp: 15, humidity: 45 } },
    { dt: Date.parse('2026-10-20T15:00:00Z') / 1000, main: { temp: 17.5, humidity: 40 }, rain: { '3h': 0.3 } },
  ],
};

const jsonResponse = (body: unknown, status: number = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('buildOpenWeatherForecastUrl', () => {
  test('passes coordinates, credential and units as query parameters', () => {
    expect(buildOpenWeatherForecastUrl(42.5949, -72.3678, 'test-secret', 'metric')).toBe(
      'https://api.openweathermap.org/data/2.5/forecast?lat=42.5949&lon=-72.3678&appid=test-secret&units=metric',
    );
  });
});

describe('fetchOpenWeatherForecast', () => {
  test('raises a request error carrying the provider status', async () => {
    const fetchWithTimeout: FetchWithTimeout = jest.fn(async () => jsonResponse({ message: 'Invalid API key' }, 401));
    const request = fetchOpenWeatherForecast({ lat: 1, lon: 2, apiKey: 'test-secret', units: 'metric', fetchWithTimeout });

    await expect(request).rejects.toBeInstanceOf(ForecastRequestError);
    await expect(request).rejects.toMatchObject({ statusCode: 401, message: 'OpenWeather forecast failed with status 401' });
  });
});

describe('loadLocationForecasts', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  test('isolates a failing location and keeps configuration order', async () => {
    const fetchWithTimeout = jest.fn<Promise<Response>, Parameters<FetchWithTimeout>>(async (url) =>
      url.includes('lat=43') ? jsonResponse({ message: 'server error' }, 500) : jsonResponse(forecastPayload),
    );
    const locations = [
      { name: 'Farley', lat: 42, lon: -72 },
      { name: 'Rumney', lat: 43, lon: -71 },
      { name: 'The Gunks', lat: 41, lon: -74 },
    ];

    const results = await loadLocationForecasts({ locations, apiKey: 'test-secret', units: 'metric', fetchWithTimeout });

    expect(fetchWithTimeout).toHaveBeenCalledTimes(3);
    expect(results.map((result) => [result.location.name, result.status])).toEqual([
      ['Farley', 'ok'],
      ['Rumney', 'failed'],
      ['The Gunks', 'ok'],
    ]);
    expect(results[1]).toEqual({
      status: 'failed',
      location: locations[1],
      reason: 'OpenWeather forecast failed with status 500',
    });
    expect(results[0].status === 'ok' ? results[0].samples : []).toEqual([
      { time: '2026-10-20T12:00', localMs: Date.parse('2026-10-20T12:00:00Z'), tempF: 59, humidity: 45, precipMm: 0 },
      { time: '2026-10-20T15:00', localMs: Date.parse('2026-10-20T15:00:00Z'), tempF: 63.5, humidity: 40, precipMm: 0.3 },
    ]);
    expect(warnSpy).toHaveBeenCalledWith('[Forecast] Rumney fetch failed:', 'OpenWeather forecast failed with status 500');
  });

  test('reports malformed payloads and network errors as failures', async () => {
    const fetchWithTimeout = jest
      .fn<Promise<Response>, Parameters<FetchWithTimeout>>()
      .mockResolvedValueOnce(jsonResponse({ cod: '200' }))
      .mockRejectedValueOnce(new Error('socket hang up'));

    const results = await loadLocationForecasts({
      locations: [testLocation('Farley'), testLocation('Rumney')],
      apiKey: 'test-secret',
      units: 'metric',
      fetchWithTimeout,
    });

    expect(results.map((result) => (result.status === 'failed' ? result.reason : 'ok'))).toEqual([
      'Forecast response did not include a list of entries.',
      'socket hang up',
    ]);
  });
});
