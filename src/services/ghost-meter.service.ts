import { GhostMeterState } from '@/types/heating.types';

/**
 * Advance the simulated boiler electricity meter by the day's water energy
 * converted with the current coefficient. No clamping: negative readings pass through.
 */
export const advanceGhostMeter = (
  previousValue: number,
  waterKwh: number,
  coefficient: number
): GhostMeterState => ({
  previous_value: previousValue,
  new_value: previousValue + waterKwh * coefficient,
});
