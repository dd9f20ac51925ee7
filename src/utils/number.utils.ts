import { ENGINE_CONFIG } from '@/config/constants';

export const roundTo = (value: number, decimals: number = ENGINE_CONFIG.OUTPUT_PRECISION): number => {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
};

export const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

export const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);
