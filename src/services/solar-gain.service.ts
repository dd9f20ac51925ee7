import { SOLAR_CONFIG } from '@/config/constants';
import { getDayOfYear } from '@/utils/date.utils';

export interface SolarGainInput {
  date?: string;
  solar_avg?: number;            // W/m², daily average irradiance
  indoor_temperature?: number;
}

/**
 * Annual shading/efficiency cycle: 1.0 around the winter solstice, never below 0.15.
 */
export const getShadingFactor = (dayOfYear: number): number => {
  const phase = (2 * Math.PI * (dayOfYear + SOLAR_CONFIG.PHASE_OFFSET_DAYS)) / SOLAR_CONFIG.DAYS_PER_YEAR;
  const floor = SOLAR_CONFIG.MIN_SHADING_FACTOR;
  return floor + (1 - floor) * (Math.cos(phase) + 1) / 2;
};

export const calculateSolarGain = (irradiance: number, dayOfYear: number): number => {
  return (
    irradiance *
    SOLAR_CONFIG.HOURS_PER_DAY *
    SOLAR_CONFIG.WINDOW_AREA_M2 *
    SOLAR_CONFIG.G_VALUE *
    getShadingFactor(dayOfYear)
  ) / 1000;
};

// Reported alongside the day analysis; it does not feed the ghost meter.
export const estimateSolarGain = ({ date, solar_avg, indoor_temperature }: SolarGainInput): number => {
  if (!date || indoor_temperature === undefined || !(indoor_temperature > 0)) {
    return 0;
  }
  if (solar_avg === undefined || !Number.isFinite(solar_avg)) {
    return 0;
  }

  return calculateSolarGain(solar_avg, getDayOfYear(date));
};
