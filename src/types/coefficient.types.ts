export type HistoryMode =
  | 'delta'      // electricity_usage holds cumulative meter readings
  | 'direct';    // electricity_usage holds the day's own consumption

export type CoefficientStrategy =
  | 'recent_window'
  | 'outlier_filtered';

export type CoefficientStatus =
  | 'ok'
  | 'insufficient_data'
  | 'division_by_zero'
  | 'all_outliers'
  | 'error';

export interface HistoryDayRecord {
  date: string;
  water_energy: number;              // kWh, estimated from the boiler loop
  electricity_usage: number;         // kWh, cumulative or daily depending on mode
}

export interface ValidDay {
  date: string;
  water: number;
  electricity: number;
}

export interface CoefficientRequest {
  history: HistoryDayRecord[];
  mode: HistoryMode;
  strategy: CoefficientStrategy;
}

export interface CoefficientEstimate {
  coefficient: number;
  raw_coefficient: number | null;
  status: CoefficientStatus;
  reason: string;
  sample_size: number;
  mode: HistoryMode;
  strategy: CoefficientStrategy;
}
