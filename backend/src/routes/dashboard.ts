import { Express, Request, Response } from 'express';
import { FetchWithTimeout } from '../utils/http-client.js';
import { LocationConfig } from '../utils/locations.js';
import { loadLocationForecasts } from '../utils/forecast-service.js';
import { renderDashboard } from '../utils/dashboard-renderer.js';
import { SvgSurface } from '../utils/drawing-surface.js';
import { RasterizeSvg } from '../utils/rasterize.js';
import { pngDataUrl, renderDashboardPage, renderMessagePage } from '../utils/page-template.js';
import { ForecastUnits } from '../utils/weather.js';

export const MISSING_API_KEY_MESSAGE = 'Error: Please set your OPENWEATHER_API_KEY environment variable.';
export const NO_DATA_MESSAGE = 'No data available to plot.';
export const RENDER_FAILED_MESSAGE = 'Error: The forecast chart could not be rendered.';

interface RegisterDashboardRouteOptions {
  app: Express;
  locations: readonly LocationConfig[];
  apiKey: string | null;
  units: ForecastUnits;
  fetchWithTimeout: FetchWithTimeout;
  rasterizeSvg: RasterizeSvg;
}

export const registerDashboardRoute = ({ app, locations, apiKey, units, fetchWithTimeout, rasterizeSvg }: RegisterDashboardRouteOptions) => {
  app.get('/', async (_req: Request, res: Response) => {
    res.type('html');
    if (!apiKey) {
      return res.status(500).send(renderMessagePage(MISSING_API_KEY_MESSAGE));
    }

    try {
      const results = await loadLocationForecasts({ locations, apiKey, units, fetchWithTimeout });
      const surface = renderDashboard(results, (width, height) => new SvgSurface(width, height));
      if (!surface) {
        return res.status(502).send(renderMessagePage(NO_DATA_MESSAGE));
      }
      const png = await rasterizeSvg(surface.toSvg());
      return res.status(200).send(renderDashboardPage(pngDataUrl(png), new Date().toISOString()));
    } catch (error) {
      console.error('[Dashboard] render failed:', error);
      return res.status(500).send(renderMessagePage(RENDER_FAILED_MESSAGE));
    }
  });
};
