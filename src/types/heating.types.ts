// Raw sample as it arrives from the upstream logger
export interface SensorSample {
  timestamp: string;                 // ISO-like, e.g. "2025-01-14T06:30:00" or "2025-01-14 06:30:00"
  supply_temp: number;               // °C
  return_temp: number;               // °C
}

// Sample after timestamp parsing
export interface TimedSample {
  timestamp_ms: number;
  supply_temp: number;
  return_temp: number;
}

export interface ResampledPoint {
  minute_offset: number;             // minutes since the first grid point
  timestamp_ms: number;
  supply_temp: number;
  return_temp: number;
}

export interface RunThresholds {
  delta_t: number;                   // °C, supply − return must exceed this
  min_supply_temp: number;           // °C, supply must exceed this
}

export interface ClassifiedPoint extends ResampledPoint {
  delta_t: number;
  is_running: boolean;
  power_kw: number;
}

export interface EnergyResult {
  kwh: number;
  run_minutes: number;
  off_minutes: number;
  error?: string;
}

export interface GhostMeterState {
  previous_value: number;
  new_value: number;
}

// Day analysis request, after request parsing
export interface DayAnalysisInput {
  samples: SensorSample[];
  flow_rate: number;                 // l/min, constant for the batch
  indoor_temperature?: number;
  solar_avg?: number;                // W/m²
  previous_meter_value?: number;
  date?: string;                     // YYYY-MM-DD
  current_coefficient?: number;
}

export interface DayAnalysisResult {
  kwh: number;
  run_minutes: number;
  off_minutes: number;
  new_meter_value: number;
  solar_gain: number;
  used_coefficient: number;
  sample_count: number;
  error?: string;
}
