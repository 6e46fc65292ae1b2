import { DailyStats, aggregateDailyStats } from './daily-aggregation.js';
import { ForecastSample } from './weather.js';

export const MIN_FAVORABILITY = 0;
export const MAX_FAVORABILITY = 0.8;

export interface ForecastDay extends DailyStats {
  favorability: number;
}

export const temperatureScore = (maxTempF: number): number => {
  if (maxTempF <= 32 || maxTempF >= 80) {
    return 0;
  }
  if (maxTempF >= 60 && maxTempF <= 69) {
    return 1;
  }
  if (maxTempF > 40 && maxTempF < 60) {
    return (maxTempF - 40) / (60 - 40);
  }
  if (maxTempF > 69 && maxTempF < 80) {
    return (80 - maxTempF) / (80 - 69);
  }
  // (32, 40] and NaN; the 40-60 ramp is already 0 at 40.
  return 0;
};

export const humidityScore = (maxHumidity: number): number => {
  if (maxHumidity <= 50) {
    return 1;
  }
  if (maxHumidity >= 80) {
    return 0;
  }
  if (maxHumidity > 50 && maxHumidity < 80) {
    return (80 - maxHumidity) / (80 - 50);
  }
  return 0;
};

export const calculateFavorability = (stats: DailyStats): number => {
  if (!stats.isComplete || stats.maxPrecipMm > 0 || stats.maxTempF === null || stats.maxHumidity === null) {
    return MIN_FAVORABILITY;
  }
  const combinedScore = temperatureScore(stats.maxTempF) * humidityScore(stats.maxHumidity);
  return MIN_FAVORABILITY + (MAX_FAVORABILITY - MIN_FAVORABILITY) * combinedScore;
};

export const scoreDailyStats = (dailyStats: readonly DailyStats[]): ForecastDay[] =>
  dailyStats.map((stats) => ({ ...stats, favorability: calculateFavorability(stats) }));

export const buildForecastDays = (samples: readonly ForecastSample[]): ForecastDay[] => scoreDailyStats(aggregateDailyStats(samples));
