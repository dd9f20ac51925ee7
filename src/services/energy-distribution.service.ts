import { AllocatedDay, DistributionRequest, DistributionResult } from '@/types/distribution.types';
import { roundTo, sum } from '@/utils/number.utils';
import { logger } from '@/utils/logger';

/**
 * Split one aggregate electricity delta across days in proportion to each day's
 * water energy. With no water energy at all the delta is split evenly.
 * Output order follows input order.
 */
export const distributeElectricity = (request: DistributionRequest): DistributionResult => {
  const { total_electricity_delta: total, daily_water_logs: logs } = request;

  try {
    if (!Number.isFinite(total)) {
      throw new Error(`total_electricity_delta must be a finite number, got: ${total}`);
    }
    const invalid = logs.find(log => !Number.isFinite(log.water_energy));
    if (invalid) {
      throw new Error(`Invalid water_energy for ${invalid.date || 'unknown date'}`);
    }

    if (logs.length === 0) {
      return { results: [], total_water_energy: 0, even_split: false };
    }

    const totalWater = sum(logs.map(log => log.water_energy));
    if (!Number.isFinite(totalWater)) {
      throw new Error('Total water energy overflows a finite number');
    }

    let results: AllocatedDay[];
    const evenSplit = totalWater === 0;
    if (evenSplit) {
      const share = total / logs.length;
      results = logs.map(log => ({ date: log.date, allocated_electricity: roundTo(share) }));
    } else {
      results = logs.map(log => ({
        date: log.date,
        allocated_electricity: roundTo(total * (log.water_energy / totalWater)),
      }));
    }

    logger.debug(`Distributed ${total} kWh across ${logs.length} days`, { even_split: evenSplit });

    return { results, total_water_energy: roundTo(totalWater), even_split: evenSplit };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Energy distribution failed: ${message}`);
    return {
      results: logs.map(log => ({ date: log.date, allocated_electricity: 0 })),
      total_water_energy: 0,
      even_split: false,
      error: message,
    };
  }
};
