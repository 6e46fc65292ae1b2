import { LocationForecastResult } from './forecast-service.js';
import { BandLayout, buildDashboardLayout } from './dashboard-layout.js';
import { DrawingSurface } from './drawing-surface.js';

const TEMPERATURE_COLOR = '#8B0000';
const HUMIDITY_COLOR = '#0000ff';
const FAVORABLE_COLOR = '#008000';
const SEPARATOR_COLOR = '#d3d3d3';
const LABEL_COLOR = '#000000';
const RAIN_COLOR = '#000080';
const FRAME_COLOR = '#444444';
const LABEL_OPACITY = 0.7;
const RAIN_GLYPH = '☔';

const drawBandTitle = (surface: DrawingSurface, band: BandLayout) => {
  surface.drawText(surface.width / 2, band.top + 28, band.title, { fill: LABEL_COLOR, fontSize: 20, anchor: 'middle', bold: true });
};

const drawDateTicks = (surface: DrawingSurface, band: BandLayout) => {
  const bottom = band.plot.top + band.plot.height;
  band.dateTicks.forEach((tick) => {
    surface.drawLine([tick.position, bottom], [tick.position, bottom + 4], { stroke: FRAME_COLOR, strokeWidth: 1 });
    surface.drawText(tick.position + 2, bottom + 18, tick.label, { fill: LABEL_COLOR, fontSize: 11, anchor: 'start' });
  });
};

const drawAxes = (surface: DrawingSurface, band: BandLayout) => {
  const { plot } = band;
  const right = plot.left + plot.width;

  surface.drawRect(plot.left, plot.top, plot.width, plot.height, { stroke: FRAME_COLOR, strokeWidth: 1 });
  drawDateTicks(surface, band);

  band.temperatureTicks.forEach((tick) => {
    surface.drawLine([plot.left - 4, tick.position], [plot.left, tick.position], { stroke: TEMPERATURE_COLOR, strokeWidth: 1 });
    surface.drawText(plot.left - 8, tick.position + 4, tick.label, { fill: TEMPERATURE_COLOR, fontSize: 12, anchor: 'end' });
  });
  band.humidityTicks.forEach((tick) => {
    surface.drawLine([right, tick.position], [right + 4, tick.position], { stroke: HUMIDITY_COLOR, strokeWidth: 1 });
    surface.drawText(right + 8, tick.position + 4, tick.label, { fill: HUMIDITY_COLOR, fontSize: 12, anchor: 'start' });
  });
  const middleY = plot.top + plot.height / 2;
  surface.drawText(plot.left - 48, middleY, 'Temp (°F)', { fill: TEMPERATURE_COLOR, fontSize: 14, anchor: 'middle', rotate: -90 });
  surface.drawText(right + 52, middleY, 'Humidity (%)', { fill: HUMIDITY_COLOR, fontSize: 14, anchor: 'middle', rotate: 90 });
};

export const drawBand = (surface: DrawingSurface, band: BandLayout) => {
  drawBandTitle(surface, band);
  if (band.isEmpty) {
    if (band.dateTicks.length) {
      const { plot } = band;
      surface.drawRect(plot.left, plot.top, plot.width, plot.height, { stroke: FRAME_COLOR, strokeWidth: 1 });
      drawDateTicks(surface, band);
    }
    return;
  }

  const { plot } = band;
  band.shadedDays.forEach((shade) => {
    surface.drawRect(shade.x, plot.top, shade.width, plot.height, { fill: FAVORABLE_COLOR, opacity: shade.opacity });
  });
  band.separators.forEach((x) => {
    surface.drawLine([x, plot.top], [x, plot.top + plot.height], { stroke: SEPARATOR_COLOR, strokeWidth: 0.7 });
  });

  surface.drawPolyline(band.temperaturePoints, { stroke: TEMPERATURE_COLOR, strokeWidth: 1, opacity: 0.5 });
  surface.drawPolyline(band.humidityPoints, { stroke: HUMIDITY_COLOR, strokeWidth: 1, opacity: 0.5 });

  band.dayLabels.forEach((label) => {
    surface.drawText(label.x, label.weekdayY, label.weekday, { fill: LABEL_COLOR, fontSize: 13, anchor: 'middle', bold: true, opacity: LABEL_OPACITY });
    surface.drawText(label.x, label.statsY, label.stats, { fill: LABEL_COLOR, fontSize: 11, anchor: 'middle', opacity: LABEL_OPACITY });
  });
  band.rainMarks.forEach((mark) => {
    surface.drawText(mark.x - 2, mark.y, RAIN_GLYPH, { fill: RAIN_COLOR, fontSize: 24, anchor: 'end', opacity: 0.8 });
    surface.drawText(mark.x + 2, mark.y, mark.text, { fill: RAIN_COLOR, fontSize: 13, anchor: 'start', opacity: 0.8 });
  });

  drawAxes(surface, band);
};

/**
 * Draws one band per location onto a freshly created surface. Returns `null`
 * when no location has any data, so callers can answer with a "no data" page
 * instead of a blank image.
 */
export const renderDashboard = <S extends DrawingSurface>(
  results: readonly LocationForecastResult[],
  createSurface: (width: number, height: number) => S,
): S | null => {
  const layout = buildDashboardLayout(results);
  if (!layout) {
    return null;
  }
  const surface = createSurface(layout.width, layout.height);
  layout.bands.forEach((band) => drawBand(surface, band));
  return surface;
};
