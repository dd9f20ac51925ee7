import { analyzeDay } from '@/services/day-analysis.service';
import { SensorSample } from '@/types/heating.types';

const halfHourRun: SensorSample[] = [
  { timestamp: '2025-01-14T06:00:00Z', supply_temp: 60, return_temp: 50 },
  { timestamp: '2025-01-14T06:30:00Z', supply_temp: 60, return_temp: 50 },
];

describe('Day Analysis Service', () => {
  it('should return a full off day for an empty batch', () => {
    const result = analyzeDay({ samples: [], flow_rate: 12, previous_meter_value: 250 });

    expect(result).toEqual({
      kwh: 0,
      run_minutes: 0,
      off_minutes: 1440,
      new_meter_value: 250,
      solar_gain: 0,
      used_coefficient: 1.157,
      sample_count: 0,
    });
  });

  it('should estimate energy and advance the ghost meter', () => {
    const result = analyzeDay({
      samples: halfHourRun,
      flow_rate: 12,
      previous_meter_value: 100,
      current_coefficient: 1.1,
    });

    expect(result.kwh).toBe(4.182);
    expect(result.run_minutes).toBe(31);
    expect(result.off_minutes).toBe(1409);
    // 100 + 4.182 * 1.1
    expect(result.new_meter_value).toBe(104.6);
    expect(result.used_coefficient).toBe(1.1);
    expect(result.sample_count).toBe(2);
    expect(result.error).toBeUndefined();
  });

  it('should report solar gain without adding it to the meter', () => {
    const withSun = analyzeDay({
      samples: halfHourRun,
      flow_rate: 12,
      previous_meter_value: 100,
      current_coefficient: 1.1,
      indoor_temperature: 21,
      solar_avg: 100,
      date: '2025-12-21',
    });

    expect(withSun.solar_gain).toBe(17.28);
    expect(withSun.new_meter_value).toBe(104.6);
  });

  it('should keep the meter unchanged and report an error for malformed samples', () => {
    const result = analyzeDay({
      samples: [{ timestamp: '', supply_temp: NaN, return_temp: NaN }],
      flow_rate: 12,
      previous_meter_value: 100,
    });

    expect(result.kwh).toBe(0);
    expect(result.off_minutes).toBe(1440);
    expect(result.new_meter_value).toBe(100);
    expect(result.error).toBe('Invalid timestamp at sample 0: ');
  });

  it('should pass a negative previous meter value through', () => {
    const result = analyzeDay({ samples: [], flow_rate: 0, previous_meter_value: -12.5 });
    expect(result.new_meter_value).toBe(-12.5);
  });
});
