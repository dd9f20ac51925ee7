import { DayAnalysisInput, DayAnalysisResult } from '@/types/heating.types';
import { COEFFICIENT_CONFIG, ENGINE_CONFIG } from '@/config/constants';
import { estimateEnergy } from '@/services/energy-integration.service';
import { estimateSolarGain } from '@/services/solar-gain.service';
import { advanceGhostMeter } from '@/services/ghost-meter.service';
import { roundTo } from '@/utils/number.utils';
import { logger } from '@/utils/logger';

/**
 * Analyse one day of boiler samples: water energy, run/off minutes, solar gain
 * and the advanced ghost meter reading.
 */
export const analyzeDay = (input: DayAnalysisInput): DayAnalysisResult => {
  const coefficient = input.current_coefficient ?? COEFFICIENT_CONFIG.DEFAULT;
  const previousMeter = input.previous_meter_value ?? 0;

  try {
    const energy = estimateEnergy(input.samples, input.flow_rate);
    const solarGain = estimateSolarGain(input);
    const meter = advanceGhostMeter(previousMeter, energy.kwh, coefficient);

    const result: DayAnalysisResult = {
      kwh: roundTo(energy.kwh),
      run_minutes: energy.run_minutes,
      off_minutes: energy.off_minutes,
      new_meter_value: roundTo(meter.new_value),
      solar_gain: roundTo(solarGain),
      used_coefficient: coefficient,
      sample_count: input.samples.length,
    };

    if (energy.error !== undefined) {
      result.error = energy.error;
    } else {
      logger.info(`Day analysed: ${result.kwh} kWh, ${result.run_minutes} run minutes`, {
        date: input.date,
        samples: input.samples.length,
      });
    }

    return result;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Day analysis failed: ${message}`);
    return {
      kwh: 0,
      run_minutes: 0,
      off_minutes: ENGINE_CONFIG.DAY_MINUTES,
      new_meter_value: previousMeter,
      solar_gain: 0,
      used_coefficient: coefficient,
      sample_count: input.samples.length,
      error: message,
    };
  }
};
