import {
  ClassifiedPoint,
  EnergyResult,
  ResampledPoint,
  RunThresholds,
  SensorSample,
} from '@/types/heating.types';
import { ENGINE_CONFIG } from '@/config/constants';
import {
  parseSensorSamples,
  resampleToMinuteGrid,
  toMinuteBucket,
} from '@/utils/time-series.utils';
import { logger } from '@/utils/logger';

export const DEFAULT_RUN_THRESHOLDS: RunThresholds = {
  delta_t: ENGINE_CONFIG.RUN_DELTA_T_THRESHOLD,
  min_supply_temp: ENGINE_CONFIG.RUN_SUPPLY_MIN_TEMP,
};

export const emptyEnergyResult = (error?: string): EnergyResult => ({
  kwh: 0,
  run_minutes: 0,
  off_minutes: ENGINE_CONFIG.DAY_MINUTES,
  ...(error !== undefined ? { error } : {}),
});

/**
 * Derive delta-T, run state and instantaneous power for every grid point.
 * A negative delta-T (return warmer than supply) is floored to zero.
 */
export const classifyGrid = (
  grid: ResampledPoint[],
  flowRate: number,
  thresholds: RunThresholds = DEFAULT_RUN_THRESHOLDS,
  powerFactor: number = ENGINE_CONFIG.POWER_FACTOR
): ClassifiedPoint[] => {
  return grid.map(point => {
    const delta_t = Math.max(0, point.supply_temp - point.return_temp);
    const is_running = delta_t > thresholds.delta_t && point.supply_temp > thresholds.min_supply_temp;
    const power_kw = is_running ? flowRate * delta_t * powerFactor : 0;

    return { ...point, delta_t, is_running, power_kw };
  });
};

/**
 * Trapezoidal area under y(x). Fewer than two points have no area.
 */
export const integrateTrapezoidal = (xs: number[], ys: number[]): number => {
  if (xs.length < 2 || xs.length !== ys.length) {
    return 0;
  }

  let area = 0;
  for (let i = 1; i < xs.length; i++) {
    area += ((ys[i - 1] + ys[i]) / 2) * (xs[i] - xs[i - 1]);
  }
  return area;
};

// One flag per calendar minute; a minute counts as running if any point in it ran
export const countRunMinutes = (points: ClassifiedPoint[]): number => {
  const minutes = new Map<number, boolean>();

  for (const point of points) {
    const bucket = toMinuteBucket(point.timestamp_ms);
    minutes.set(bucket, (minutes.get(bucket) ?? false) || point.is_running);
  }

  let running = 0;
  for (const isRunning of minutes.values()) {
    if (isRunning) running++;
  }
  return running;
};

export const computeEnergy = (
  grid: ResampledPoint[],
  flowRate: number,
  thresholds: RunThresholds = DEFAULT_RUN_THRESHOLDS
): EnergyResult => {
  if (grid.length === 0) {
    return emptyEnergyResult();
  }

  const points = classifyGrid(grid, flowRate, thresholds);
  const hours = points.map(p => p.minute_offset / 60);
  const power = points.map(p => p.power_kw);

  const kwh = Math.max(0, integrateTrapezoidal(hours, power));
  const run_minutes = countRunMinutes(points);
  // a batch longer than one day is counted over its own length
  const totalMinutes = Math.max(ENGINE_CONFIG.DAY_MINUTES, grid.length);

  return {
    kwh,
    run_minutes,
    off_minutes: totalMinutes - run_minutes,
  };
};

/**
 * Estimate boiler water energy for one batch of raw samples.
 * Never throws: malformed input degrades to the empty result with an error message.
 */
export const estimateEnergy = (
  samples: SensorSample[],
  flowRate: number,
  thresholds: RunThresholds = DEFAULT_RUN_THRESHOLDS
): EnergyResult => {
  if (samples.length === 0) {
    return emptyEnergyResult();
  }

  try {
    if (!Number.isFinite(flowRate) || flowRate < 0) {
      throw new Error(`flow_rate must be a non-negative number, got: ${flowRate}`);
    }

    const grid = resampleToMinuteGrid(parseSensorSamples(samples));
    return computeEnergy(grid, flowRate, thresholds);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Energy estimation degraded to empty result: ${message}`);
    return emptyEnergyResult(message);
  }
};
