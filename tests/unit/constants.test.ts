import { ConfigurationError } from '@/config';
import { readIntegerSetting } from '@/config/constants';

describe('Engine constants', () => {
  describe('readIntegerSetting', () => {
    it('should fall back to the default when the variable is unset', () => {
      expect(readIntegerSetting('COEFFICIENT_WINDOW_DAYS', undefined, 7, 1)).toBe(7);
    });

    it('should accept an integer at or above the minimum', () => {
      expect(readIntegerSetting('COEFFICIENT_WINDOW_DAYS', '14', 7, 1)).toBe(14);
      expect(readIntegerSetting('OUTPUT_PRECISION', '0', 3, 0)).toBe(0);
    });

    it('should reject a zero window', () => {
      expect(() => readIntegerSetting('COEFFICIENT_WINDOW_DAYS', '0', 7, 1)).toThrow(
        'Environment variable COEFFICIENT_WINDOW_DAYS must be at least 1, got: 0'
      );
    });

    it('should reject a non-numeric value', () => {
      expect(() => readIntegerSetting('MAX_GRID_MINUTES', 'week', 10080, 1)).toThrow(ConfigurationError);
      expect(() => readIntegerSetting('MAX_GRID_MINUTES', 'week', 10080, 1)).toThrow(
        'Environment variable MAX_GRID_MINUTES must be a valid number, got: week'
      );
    });
  });
});
