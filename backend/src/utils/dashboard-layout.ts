import { LocationForecastResult, samplesOf } from './forecast-service.js';
import { ForecastDay, buildForecastDays } from './scoring.js';
import { MS_PER_DAY, MS_PER_HOUR, axisDateLabel, startOfDayMs, weekdayLabel } from './time.js';
import { mmToInches } from './weather.js';

export const CANVAS_WIDTH = 1200;
export const BAND_HEIGHT = 300;
export const BAND_MARGIN = { top: 44, right: 80, bottom: 40, left: 80 };

export const TIME_AXIS_LEAD_MS = 6 * MS_PER_HOUR;
export const TIME_AXIS_TRAIL_MS = MS_PER_DAY;
export const TEMPERATURE_HEADROOM = 0.05;
export const FALLBACK_TEMPERATURE_CEILING_F = 10;
export const HUMIDITY_AXIS_MAX = 105;

// Fractions of the band's vertical data range, measured from the bottom.
const DAY_LABEL_FRACTION = 0.15;
const STATS_LABEL_FRACTION = 0.07;
const RAIN_LABEL_FRACTION = 0.28;

export interface TimeAxis {
  startMs: number;
  endMs: number;
}

export interface PlotArea {
  left: number;
  top: number;
  width: number;
  height: number;
}

export type Point = [number, number];

export interface ShadedDay {
  date: string;
  x: number;
  width: number;
  opacity: number;
}

export interface DayLabel {
  date: string;
  x: number;
  weekday: string;
  weekdayY: number;
  stats: string;
  statsY: number;
}

export interface RainMark {
  date: string;
  x: number;
  y: number;
  text: string;
}

export interface AxisTick {
  position: number;
  label: string;
}

export interface BandLayout {
  title: string;
  isEmpty: boolean;
  top: number;
  plot: PlotArea;
  days: ForecastDay[];
  temperaturePoints: Point[];
  humidityPoints: Point[];
  separators: number[];
  shadedDays: ShadedDay[];
  dayLabels: DayLabel[];
  rainMarks: RainMark[];
  temperatureTicks: AxisTick[];
  humidityTicks: AxisTick[];
  dateTicks: AxisTick[];
}

export interface DashboardLayout {
  width: number;
  height: number;
  axis: TimeAxis;
  temperatureCeilingF: number;
  bands: BandLayout[];
}

export const computeTimeAxis = (results: readonly LocationForecastResult[]): TimeAxis | null => {
  const times = results.flatMap((result) => samplesOf(result).map((sample) => sample.localMs));
  if (!times.length) {
    return null;
  }
  return {
    startMs: Math.min(...times) - TIME_AXIS_LEAD_MS,
    endMs: Math.max(...times) + TIME_AXIS_TRAIL_MS,
  };
};

/** Shared across bands so every location reads on the same temperature scale. */
export const computeTemperatureCeiling = (results: readonly LocationForecastResult[]): number => {
  const maxTempF = results.reduce(
    (currentMax, result) => Math.max(currentMax, ...samplesOf(result).map((sample) => sample.tempF)),
    0,
  );
  const ceiling = maxTempF * (1 + TEMPERATURE_HEADROOM);
  return ceiling > 0 ? ceiling : FALLBACK_TEMPERATURE_CEILING_F;
};

export const formatDayStats = (day: ForecastDay): string =>
  day.isComplete && day.maxTempF !== null && day.maxHumidity !== null
    ? `T: ${day.maxTempF.toFixed(0)}°F, H: ${day.maxHumidity.toFixed(0)}%`
    : 'T: TBD, H: TBD';

export const formatRainInches = (precipMm: number): string | null => {
  const inches = mmToInches(precipMm);
  return inches > 0 ? `${inches.toFixed(2)} in` : null;
};

export const createProjection = (plot: PlotArea, axis: TimeAxis, temperatureCeilingF: number) => {
  const bottom = plot.top + plot.height;
  return {
    x: (ms: number): number => plot.left + ((ms - axis.startMs) / (axis.endMs - axis.startMs)) * plot.width,
    temperatureY: (tempF: number): number => bottom - (tempF / temperatureCeilingF) * plot.height,
    humidityY: (humidity: number): number => bottom - (humidity / HUMIDITY_AXIS_MAX) * plot.height,
    fractionY: (fraction: number): number => bottom - fraction * plot.height,
  };
};

const buildValueTicks = (maxValue: number, step: number, toY: (value: number) => number, suffix: string = ''): AxisTick[] => {
  const ticks: AxisTick[] = [];
  for (let value = 0; value <= maxValue; value += step) {
    ticks.push({ position: toY(value), label: `${value}${suffix}` });
  }
  return ticks;
};

const buildDateTicks = (axis: TimeAxis, toX: (ms: number) => number): AxisTick[] => {
  const ticks: AxisTick[] = [];
  const firstMidnight = Math.ceil(axis.startMs / MS_PER_DAY) * MS_PER_DAY;
  for (let ms = firstMidnight; ms <= axis.endMs; ms += MS_PER_DAY) {
    ticks.push({ position: toX(ms), label: axisDateLabel(ms) });
  }
  return ticks;
};

interface BuildBandLayoutOptions {
  result: LocationForecastResult;
  index: number;
  isLast: boolean;
  axis: TimeAxis;
  temperatureCeilingF: number;
  width?: number;
}

export const buildBandLayout = ({
  result,
  index,
  isLast,
  axis,
  temperatureCeilingF,
  width = CANVAS_WIDTH,
}: BuildBandLayoutOptions): BandLayout => {
  const top = index * BAND_HEIGHT;
  const plot: PlotArea = {
    left: BAND_MARGIN.left,
    top: top + BAND_MARGIN.top,
    width: width - BAND_MARGIN.left - BAND_MARGIN.right,
    height: BAND_HEIGHT - BAND_MARGIN.top - BAND_MARGIN.bottom,
  };
  const project = createProjection(plot, axis, temperatureCeilingF);
  const samples = samplesOf(result);
  const band: BandLayout = {
    title: result.location.name,
    isEmpty: samples.length === 0,
    top,
    plot,
    days: [],
    temperaturePoints: [],
    humidityPoints: [],
    separators: [],
    shadedDays: [],
    dayLabels: [],
    rainMarks: [],
    temperatureTicks: [],
    humidityTicks: [],
    // The bottom band carries the shared date axis even when its location has no data.
    dateTicks: isLast ? buildDateTicks(axis, project.x) : [],
  };
  if (band.isEmpty) {
    return band;
  }

  band.days = buildForecastDays(samples);
  band.temperaturePoints = samples.map((sample): Point => [project.x(sample.localMs), project.temperatureY(sample.tempF)]);
  band.humidityPoints = samples.map((sample): Point => [project.x(sample.localMs), project.humidityY(sample.humidity)]);
  band.temperatureTicks = buildValueTicks(temperatureCeilingF, 20, project.temperatureY);
  band.humidityTicks = buildValueTicks(100, 20, project.humidityY);

  const dayWidth = project.x(axis.startMs + MS_PER_DAY) - project.x(axis.startMs);

  // The first day starts at the axis edge: no separator, shading or label.
  band.days.slice(1).forEach((day) => {
    const dayStartX = project.x(startOfDayMs(day.date));
    const centerX = dayStartX + dayWidth / 2;
    band.separators.push(dayStartX);

    if (day.favorability > 0) {
      band.shadedDays.push({ date: day.date, x: dayStartX, width: dayWidth, opacity: day.favorability });
    }

    band.dayLabels.push({
      date: day.date,
      x: centerX,
      weekday: weekdayLabel(day.date),
      weekdayY: project.fractionY(DAY_LABEL_FRACTION),
      stats: formatDayStats(day),
      statsY: project.fractionY(STATS_LABEL_FRACTION),
    });

    const rainText = formatRainInches(day.maxPrecipMm);
    if (rainText) {
      band.rainMarks.push({ date: day.date, x: centerX, y: project.fractionY(RAIN_LABEL_FRACTION), text: rainText });
    }
  });

  const lastDay = band.days[band.days.length - 1];
  band.separators.push(project.x(startOfDayMs(lastDay.date) + MS_PER_DAY));

  return band;
};

/**
 * Pure layout for the whole dashboard, or `null` when no location produced a
 * single sample.
 */
export const buildDashboardLayout = (results: readonly LocationForecastResult[], width: number = CANVAS_WIDTH): DashboardLayout | null => {
  const axis = computeTimeAxis(results);
  if (!axis) {
    return null;
  }
  const temperatureCeilingF = computeTemperatureCeiling(results);
  return {
    width,
    height: BAND_HEIGHT * results.length,
    axis,
    temperatureCeilingF,
    bands: results.map((result, index) =>
      buildBandLayout({ result, index, isLast: index === results.length - 1, axis, temperatureCeilingF, width }),
    ),
  };
};
