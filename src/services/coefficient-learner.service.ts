import {
  CoefficientEstimate,
  CoefficientRequest,
  CoefficientStatus,
  HistoryDayRecord,
  HistoryMode,
  ValidDay,
} from '@/types/coefficient.types';
import { COEFFICIENT_CONFIG } from '@/config/constants';
import { parseDate } from '@/utils/date.utils';
import { clamp, roundTo, sum } from '@/utils/number.utils';
import { logger } from '@/utils/logger';

interface StrategyOutcome {
  coefficient: number;
  raw_coefficient: number | null;
  status: CoefficientStatus;
  reason: string;
  sample_size: number;
}

const sortByDate = (history: HistoryDayRecord[]): HistoryDayRecord[] => {
  const dated = history.map(record => {
    const time = parseDate(record.date);
    if (time === null) {
      throw new Error(`Invalid date in history: ${record.date}`);
    }
    return { record, time };
  });

  return dated.sort((a, b) => a.time - b.time).map(entry => entry.record);
};

/**
 * Turn raw history into per-day (water, electricity) pairs, oldest first.
 * In delta mode the electricity figure is the difference between consecutive
 * cumulative meter readings; the first day has no predecessor and gets 0.
 */
export const deriveDailyUsage = (history: HistoryDayRecord[], mode: HistoryMode): ValidDay[] => {
  const sorted = sortByDate(history);

  return sorted.map((record, index) => {
    let electricity = record.electricity_usage;
    if (mode === 'delta') {
      electricity = index === 0 ? 0 : record.electricity_usage - sorted[index - 1].electricity_usage;
    }
    return { date: record.date, water: record.water_energy, electricity };
  });
};

// Near-zero days (no heating, meter idle) say nothing about efficiency
export const filterActiveDays = (
  days: ValidDay[],
  minActivity: number = COEFFICIENT_CONFIG.MIN_ACTIVITY_KWH
): ValidDay[] => days.filter(day => day.water > minActivity && day.electricity > minActivity);

const defaultOutcome = (status: CoefficientStatus, reason: string, sampleSize: number): StrategyOutcome => ({
  coefficient: COEFFICIENT_CONFIG.DEFAULT,
  raw_coefficient: null,
  status,
  reason,
  sample_size: sampleSize,
});

/**
 * Ratio of summed electricity to summed water over the most recent active days,
 * clamped to the safe operating range.
 */
export const estimateRecentWindow = (
  validDays: ValidDay[],
  windowDays: number = COEFFICIENT_CONFIG.WINDOW_DAYS
): StrategyOutcome => {
  const window = validDays.slice(-windowDays);
  const sumElectricity = sum(window.map(day => day.electricity));
  const sumWater = sum(window.map(day => day.water));

  if (sumWater === 0) {
    return defaultOutcome('division_by_zero', 'Division by zero: no water energy in window', window.length);
  }

  const raw = sumElectricity / sumWater;
  const safe = clamp(raw, COEFFICIENT_CONFIG.CLAMP_MIN, COEFFICIENT_CONFIG.CLAMP_MAX);

  return {
    coefficient: roundTo(safe),
    raw_coefficient: roundTo(raw),
    status: 'ok',
    reason: `Computed from ${window.length} days (raw: ${raw.toFixed(3)})`,
    sample_size: window.length,
  };
};

/**
 * Water-weighted mean of per-day ratios after dropping days whose ratio lies
 * outside the plausible band. Days with more water energy weigh more.
 * The outlier band stands in for a clamp, so the result is not clamped.
 */
export const estimateOutlierFiltered = (validDays: ValidDay[]): StrategyOutcome => {
  const kept = validDays.filter(day => {
    const ratio = day.electricity / day.water;
    return ratio >= COEFFICIENT_CONFIG.OUTLIER_RATIO_MIN && ratio <= COEFFICIENT_CONFIG.OUTLIER_RATIO_MAX;
  });

  if (kept.length === 0) {
    return defaultOutcome('all_outliers', `All ${validDays.length} days rejected as outliers`, 0);
  }

  const totalWeight = sum(kept.map(day => day.water));
  const weighted = sum(kept.map(day => (day.electricity / day.water) * day.water)) / totalWeight;

  return {
    coefficient: roundTo(weighted),
    raw_coefficient: roundTo(weighted),
    status: 'ok',
    reason: `Weighted average of ${kept.length} days (${validDays.length - kept.length} outliers dropped)`,
    sample_size: kept.length,
  };
};

/**
 * Learn the water-to-electricity coefficient from daily history.
 * Never throws: every failure path returns the default coefficient with a status.
 */
export const learnCoefficient = (request: CoefficientRequest): CoefficientEstimate => {
  const { mode, strategy } = request;

  try {
    const validDays = filterActiveDays(deriveDailyUsage(request.history, mode));

    let outcome: StrategyOutcome;
    if (validDays.length < COEFFICIENT_CONFIG.MIN_VALID_DAYS) {
      outcome = defaultOutcome(
        'insufficient_data',
        `Not enough valid days (${validDays.length} < ${COEFFICIENT_CONFIG.MIN_VALID_DAYS})`,
        validDays.length
      );
    } else if (strategy === 'outlier_filtered') {
      outcome = estimateOutlierFiltered(validDays);
    } else {
      outcome = estimateRecentWindow(validDays);
    }

    if (outcome.status === 'all_outliers') {
      // Every active day outside the plausible band usually means a faulty meter
      logger.notify(`Coefficient fell back to default: ${outcome.reason}`, { mode, strategy });
    } else if (outcome.status !== 'ok') {
      logger.warn(`Coefficient fell back to default: ${outcome.reason}`, { mode, strategy });
    } else {
      logger.info(`Coefficient learned: ${outcome.coefficient}`, { mode, strategy, sample_size: outcome.sample_size });
    }

    return { ...outcome, mode, strategy };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Coefficient learning failed: ${message}`);
    return { ...defaultOutcome('error', `Error: ${message}`, 0), mode, strategy };
  }
};
