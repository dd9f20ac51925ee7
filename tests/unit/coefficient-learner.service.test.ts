import {
  deriveDailyUsage,
  estimateOutlierFiltered,
  estimateRecentWindow,
  filterActiveDays,
  learnCoefficient,
} from '@/services/coefficient-learner.service';
import { HistoryDayRecord } from '@/types/coefficient.types';
import { logger } from '@/utils/logger';
import { createRandom, isoDay } from '../helpers/seeded-random';

const day = (offset: number, water: number, electricity: number): HistoryDayRecord => ({
  date: isoDay(offset),
  water_energy: water,
  electricity_usage: electricity,
});

describe('Coefficient Learner Service', () => {
  describe('deriveDailyUsage', () => {
    it('should difference cumulative readings in delta mode with 0 for the first day', () => {
      const days = deriveDailyUsage([day(0, 5, 100), day(1, 6, 107), day(2, 7, 115)], 'delta');
      expect(days.map(d => d.electricity)).toEqual([0, 7, 8]);
      expect(days.map(d => d.water)).toEqual([5, 6, 7]);
    });

    it('should keep daily usage as given in direct mode', () => {
      const days = deriveDailyUsage([day(0, 5, 6), day(1, 6, 7)], 'direct');
      expect(days.map(d => d.electricity)).toEqual([6, 7]);
    });

    it('should sort by date before differencing', () => {
      const days = deriveDailyUsage([day(2, 7, 115), day(0, 5, 100), day(1, 6, 107)], 'delta');
      expect(days.map(d => d.date)).toEqual([isoDay(0), isoDay(1), isoDay(2)]);
      expect(days.map(d => d.electricity)).toEqual([0, 7, 8]);
    });

    it('should throw on an unparseable date', () => {
      expect(() => deriveDailyUsage([{ date: 'monday', water_energy: 1, electricity_usage: 1 }], 'direct'))
        .toThrow('Invalid date in history: monday');
    });
  });

  describe('filterActiveDays', () => {
    it('should require both values to exceed the activity threshold', () => {
      const kept = filterActiveDays([
        { date: 'a', water: 0.5, electricity: 3 },
        { date: 'b', water: 3, electricity: 0.5 },
        { date: 'c', water: 0.51, electricity: 0.51 },
      ]);
      expect(kept.map(d => d.date)).toEqual(['c']);
    });
  });

  describe('estimateRecentWindow', () => {
    it('should return the default on zero water energy', () => {
      const outcome = estimateRecentWindow([{ date: 'a', water: 0, electricity: 1 }]);
      expect(outcome.status).toBe('division_by_zero');
      expect(outcome.coefficient).toBe(1.157);
      expect(outcome.raw_coefficient).toBeNull();
    });
  });

  describe('estimateOutlierFiltered', () => {
    it('should weight per-day ratios by water energy', () => {
      const outcome = estimateOutlierFiltered([
        { date: 'a', water: 10, electricity: 12 },
        { date: 'b', water: 20, electricity: 20 },
      ]);
      // (1.2 * 10 + 1.0 * 20) / 30
      expect(outcome.coefficient).toBe(1.067);
      expect(outcome.sample_size).toBe(2);
    });
  });

  describe('learnCoefficient', () => {
    it('should fall back to the default with fewer than 3 valid days after differencing', () => {
      const estimate = learnCoefficient({
        history: [day(0, 1, 0), day(1, 1, 1), day(2, 1, 2)],
        mode: 'delta',
        strategy: 'recent_window',
      });

      expect(estimate).toEqual({
        coefficient: 1.157,
        raw_coefficient: null,
        status: 'insufficient_data',
        reason: 'Not enough valid days (2 < 3)',
        sample_size: 2,
        mode: 'delta',
        strategy: 'recent_window',
      });
    });

    it('should compute the ratio of sums in delta mode', () => {
      const estimate = learnCoefficient({
        history: [day(0, 10, 100), day(1, 10, 112), day(2, 10, 124), day(3, 10, 136), day(4, 10, 148)],
        mode: 'delta',
        strategy: 'recent_window',
      });

      expect(estimate.status).toBe('ok');
      expect(estimate.coefficient).toBe(1.2);
      expect(estimate.raw_coefficient).toBe(1.2);
      expect(estimate.sample_size).toBe(4);
      expect(estimate.reason).toBe('Computed from 4 days (raw: 1.200)');
    });

    it('should only use the 7 most recent valid days', () => {
      const history = [
        day(0, 10, 15), day(1, 10, 15), day(2, 10, 15),
        ...Array.from({ length: 7 }, (_, i) => day(3 + i, 10, 10)),
      ];

      const estimate = learnCoefficient({ history, mode: 'direct', strategy: 'recent_window' });

      expect(estimate.coefficient).toBe(1);
      expect(estimate.sample_size).toBe(7);
    });

    it('should clamp the recent window coefficient to [0.7, 1.5]', () => {
      const high = learnCoefficient({
        history: [day(0, 1, 3), day(1, 1, 3), day(2, 1, 3)],
        mode: 'direct',
        strategy: 'recent_window',
      });
      const low = learnCoefficient({
        history: [day(0, 10, 1), day(1, 10, 1), day(2, 10, 1)],
        mode: 'direct',
        strategy: 'recent_window',
      });

      expect(high.coefficient).toBe(1.5);
      expect(high.raw_coefficient).toBe(3);
      expect(low.coefficient).toBe(0.7);
      expect(low.raw_coefficient).toBe(0.1);
    });

    it('should drop outlier days and not clamp in outlier_filtered mode', () => {
      const filtered = learnCoefficient({
        history: [day(0, 10, 12), day(1, 20, 20), day(2, 10, 40), day(3, 5, 3)],
        mode: 'direct',
        strategy: 'outlier_filtered',
      });
      const unclamped = learnCoefficient({
        history: [day(0, 10, 20), day(1, 10, 20), day(2, 10, 20)],
        mode: 'direct',
        strategy: 'outlier_filtered',
      });

      expect(filtered.coefficient).toBe(1.067);
      expect(filtered.sample_size).toBe(2);
      expect(filtered.reason).toBe('Weighted average of 2 days (2 outliers dropped)');
      expect(unclamped.coefficient).toBe(2);
    });

    it('should return the default when every day is an outlier', () => {
      const estimate = learnCoefficient({
        history: [day(0, 10, 30), day(1, 10, 30), day(2, 10, 30)],
        mode: 'direct',
        strategy: 'outlier_filtered',
      });

      expect(estimate.status).toBe('all_outliers');
      expect(estimate.coefficient).toBe(1.157);
      expect(estimate.sample_size).toBe(0);
    });

    it('should raise a notification when every day is an outlier', () => {
      const notifySpy = jest.spyOn(logger, 'notify');

      learnCoefficient({
        history: [day(0, 10, 30), day(1, 10, 30), day(2, 10, 30)],
        mode: 'direct',
        strategy: 'outlier_filtered',
      });

      expect(notifySpy).toHaveBeenCalledWith(
        'Coefficient fell back to default: All 3 days rejected as outliers',
        { mode: 'direct', strategy: 'outlier_filtered' }
      );
      notifySpy.mockRestore();
    });

    it('should return the default with an error status instead of throwing', () => {
      const estimate = learnCoefficient({
        history: [{ date: 'not-a-date', water_energy: 5, electricity_usage: 5 }],
        mode: 'delta',
        strategy: 'recent_window',
      });

      expect(estimate.status).toBe('error');
      expect(estimate.coefficient).toBe(1.157);
      expect(estimate.reason).toBe('Error: Invalid date in history: not-a-date');
    });

    it('should return the default for an empty history', () => {
      const estimate = learnCoefficient({ history: [], mode: 'direct', strategy: 'outlier_filtered' });
      expect(estimate.status).toBe('insufficient_data');
      expect(estimate.coefficient).toBe(1.157);
    });

    it('should always return the default for fewer than 3 valid days', () => {
      const random = createRandom(7);

      for (let run = 0; run < 30; run++) {
        const count = random.integer(0, 2);
        const history = Array.from({ length: count }, (_, i) =>
          day(i, random.between(0.6, 50), random.between(0.6, 80)));

        const estimate = learnCoefficient({ history, mode: 'direct', strategy: 'recent_window' });
        expect(estimate.coefficient).toBe(1.157);
        expect(estimate.status).toBe('insufficient_data');
      }
    });

    it('should keep random recent window estimates within [0.7, 1.5]', () => {
      const random = createRandom(2025);

      for (let run = 0; run < 50; run++) {
        const count = random.integer(3, 30);
        const history = Array.from({ length: count }, (_, i) =>
          day(i, random.between(0, 40), random.between(0, 120)));

        const estimate = learnCoefficient({ history, mode: 'direct', strategy: 'recent_window' });
        expect(estimate.coefficient).toBeGreaterThanOrEqual(0.7);
        expect(estimate.coefficient).toBeLessThanOrEqual(1.5);
      }
    });
  });
});
