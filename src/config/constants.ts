import dotenv from 'dotenv';
import { ConfigurationError, validateNumericEnvironmentVariable } from '@/config';

dotenv.config();

const readFloat = (value: string | undefined, fallback: number): number => {
  const parsed = parseFloat(value ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
};

// Unset falls back to the default; a set value must be an integer >= min
export const readIntegerSetting = (
  name: string,
  value: string | undefined,
  fallback: number,
  min: number
): number => {
  const parsed = validateNumericEnvironmentVariable(name, value, false, fallback);
  if (parsed < min) {
    throw new ConfigurationError(`Environment variable ${name} must be at least ${min}, got: ${parsed}`);
  }
  return parsed;
};

// Run classification and power integration
export const ENGINE_CONFIG = {
  RUN_DELTA_T_THRESHOLD: readFloat(process.env.RUN_DELTA_T_THRESHOLD, 0.4),   // °C
  RUN_SUPPLY_MIN_TEMP: readFloat(process.env.RUN_SUPPLY_MIN_TEMP, 25.0),       // °C
  POWER_FACTOR: readFloat(process.env.POWER_FACTOR, 0.0697),                   // kW per (l/min · °C)
  DAY_MINUTES: 1440,
  MAX_GRID_MINUTES: readIntegerSetting('MAX_GRID_MINUTES', process.env.MAX_GRID_MINUTES, 10080, 1),  // 7 days
  OUTPUT_PRECISION: readIntegerSetting('OUTPUT_PRECISION', process.env.OUTPUT_PRECISION, 3, 0),
} as const;

// Passive solar gain through glazing
export const SOLAR_CONFIG = {
  HOURS_PER_DAY: 24,
  WINDOW_AREA_M2: 12,
  G_VALUE: 0.6,
  MIN_SHADING_FACTOR: 0.15,
  PHASE_OFFSET_DAYS: 10,       // moves the cosine peak to ~21 Dec
  DAYS_PER_YEAR: 365,
} as const;

export const COEFFICIENT_CONFIG = {
  DEFAULT: readFloat(process.env.DEFAULT_COEFFICIENT, 1.157),
  MIN_ACTIVITY_KWH: readFloat(process.env.MIN_ACTIVITY_KWH, 0.5),
  MIN_VALID_DAYS: 3,
  WINDOW_DAYS: readIntegerSetting('COEFFICIENT_WINDOW_DAYS', process.env.COEFFICIENT_WINDOW_DAYS, 7, 1),
  CLAMP_MIN: 0.7,
  CLAMP_MAX: 1.5,
  OUTLIER_RATIO_MIN: 0.8,
  OUTLIER_RATIO_MAX: 2.5,
} as const;
