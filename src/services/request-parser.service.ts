import { DayAnalysisInput, SensorSample } from '@/types/heating.types';
import {
  CoefficientRequest,
  CoefficientStrategy,
  HistoryDayRecord,
  HistoryMode,
} from '@/types/coefficient.types';
import { DailyWaterLog, DistributionRequest } from '@/types/distribution.types';

// Request bodies arrive as untyped JSON. These parsers never reject: anything that
// does not fit is coerced to a value the engine recognises as malformed (NaN, '')
// so the engine can degrade it the same way it degrades bad sensor data.

type JsonObject = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const toNumber = (value: unknown): number => {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  return NaN;
};

export const toOptionalNumber = (value: unknown): number | undefined => {
  const parsed = toNumber(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const toText = (value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return '';
};

const toOptionalText = (value: unknown): string | undefined => {
  const text = toText(value);
  return text === '' ? undefined : text;
};

const toArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

const parseSample = (raw: unknown): SensorSample => {
  if (!isRecord(raw)) {
    return { timestamp: '', supply_temp: NaN, return_temp: NaN };
  }
  return {
    timestamp: toText(raw.timestamp),
    supply_temp: toNumber(raw.supply_temp),
    return_temp: toNumber(raw.return_temp),
  };
};

export const parseDayAnalysisRequest = (body: unknown): DayAnalysisInput => {
  const source: JsonObject = isRecord(body) ? body : {};

  return {
    samples: toArray(source.samples).map(parseSample),
    flow_rate: toNumber(source.flow_rate),
    indoor_temperature: toOptionalNumber(source.indoor_temperature),
    solar_avg: toOptionalNumber(source.solar_avg),
    previous_meter_value: toOptionalNumber(source.previous_meter_value),
    date: toOptionalText(source.date),
    current_coefficient: toOptionalNumber(source.current_coefficient),
  };
};

const parseHistoryRecord = (raw: unknown): HistoryDayRecord => {
  const source: JsonObject = isRecord(raw) ? raw : {};
  return {
    date: toText(source.date),
    water_energy: toNumber(source.water_energy),
    electricity_usage: toNumber(source.electricity_usage),
  };
};

export const parseCoefficientRequest = (body: unknown): CoefficientRequest => {
  const source: JsonObject = isRecord(body) ? body : {};
  const mode: HistoryMode = source.mode === 'direct' ? 'direct' : 'delta';
  const strategy: CoefficientStrategy = source.strategy === 'outlier_filtered' ? 'outlier_filtered' : 'recent_window';

  return {
    history: toArray(source.history).map(parseHistoryRecord),
    mode,
    strategy,
  };
};

const parseWaterLog = (raw: unknown): DailyWaterLog => {
  const source: JsonObject = isRecord(raw) ? raw : {};
  return {
    date: toText(source.date),
    water_energy: toNumber(source.water_energy),
  };
};

export const parseDistributionRequest = (body: unknown): DistributionRequest => {
  const source: JsonObject = isRecord(body) ? body : {};
  return {
    total_electricity_delta: toNumber(source.total_electricity_delta),
    daily_water_logs: toArray(source.daily_water_logs).map(parseWaterLog),
  };
};
