export interface DailyWaterLog {
  date: string;
  water_energy: number;
}

export interface DistributionRequest {
  total_electricity_delta: number;
  daily_water_logs: DailyWaterLog[];
}

export interface AllocatedDay {
  date: string;
  allocated_electricity: number;
}

export interface DistributionResult {
  results: AllocatedDay[];
  total_water_energy: number;
  even_split: boolean;
  error?: string;
}
