import { createApp } from './src/server/create-app.js';
import { startServer } from './src/server/start-server.js';
import {
  PORT,
  IS_PRODUCTION,
  REQUEST_TIMEOUT_MS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
  OPENWEATHER_API_KEY,
  FORECAST_UNITS,
} from './src/server/runtime.js';
import { createFetchWithTimeout } from './src/utils/http-client.js';
import { CLIMBING_LOCATIONS } from './src/utils/locations.js';
import { rasterizeSvgToPng } from './src/utils/rasterize.js';
import { registerDashboardRoute } from './src/routes/dashboard.js';
import { registerForecastRoute } from './src/routes/forecast.js';
import { registerHealthRoutes } from './src/routes/health.js';

const fetchWithTimeout = createFetchWithTimeout(REQUEST_TIMEOUT_MS);

export const app = createApp({
  isProduction: IS_PRODUCTION,
  corsAllowlist: CORS_ALLOWLIST,
  rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
  rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
});

const forecastRouteOptions = {
  app,
  locations: CLIMBING_LOCATIONS,
  apiKey: OPENWEATHER_API_KEY,
  units: FORECAST_UNITS,
  fetchWithTimeout,
};

registerDashboardRoute({ ...forecastRouteOptions, rasterizeSvg: rasterizeSvgToPng });
registerForecastRoute(forecastRouteOptions);
registerHealthRoutes(app);

if (!OPENWEATHER_API_KEY) {
  console.warn('OPENWEATHER_API_KEY is not set; the dashboard will answer with an error page.');
}

if (process.env.NODE_ENV !== 'test') {
  startServer({ app, port: PORT });
}
