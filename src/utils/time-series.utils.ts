import { ResampledPoint, SensorSample, TimedSample } from '@/types/heating.types';
import { ENGINE_CONFIG } from '@/config/constants';
import { parseDate } from '@/utils/date.utils';

export const MS_PER_MINUTE = 60 * 1000;

export class SampleFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SampleFormatError';
  }
}

export const toMinuteBucket = (timestampMs: number): number => Math.floor(timestampMs / MS_PER_MINUTE);

export const parseSensorSamples = (samples: SensorSample[]): TimedSample[] => {
  return samples.map((sample, index) => {
    const timestamp_ms = parseDate(sample.timestamp);
    if (timestamp_ms === null) {
      throw new SampleFormatError(`Invalid timestamp at sample ${index}: ${sample.timestamp}`);
    }
    if (!Number.isFinite(sample.supply_temp) || !Number.isFinite(sample.return_temp)) {
      throw new SampleFormatError(`Non-numeric temperature at sample ${index}`);
    }
    return { timestamp_ms, supply_temp: sample.supply_temp, return_temp: sample.return_temp };
  });
};

interface MinuteAnchor {
  minute: number;
  supply_temp: number;
  return_temp: number;
}

// Samples sharing a calendar minute collapse into their mean
const toMinuteAnchors = (sorted: TimedSample[]): MinuteAnchor[] => {
  const anchors: MinuteAnchor[] = [];
  let count = 0;

  for (const sample of sorted) {
    const minute = toMinuteBucket(sample.timestamp_ms);
    const last = anchors[anchors.length - 1];

    if (last && last.minute === minute) {
      count++;
      last.supply_temp += (sample.supply_temp - last.supply_temp) / count;
      last.return_temp += (sample.return_temp - last.return_temp) / count;
    } else {
      anchors.push({ minute, supply_temp: sample.supply_temp, return_temp: sample.return_temp });
      count = 1;
    }
  }

  return anchors;
};

const lerp = (from: number, to: number, fraction: number): number => from + (to - from) * fraction;

/**
 * Rebuild a uniform one-minute grid from irregular samples.
 *
 * The grid runs from the first to the last occupied minute. Occupied minutes carry
 * the mean of their samples; empty minutes are linearly interpolated between the
 * nearest occupied minutes on either side. Nothing is extrapolated.
 */
export const resampleToMinuteGrid = (
  samples: TimedSample[],
  maxGridMinutes: number = ENGINE_CONFIG.MAX_GRID_MINUTES
): ResampledPoint[] => {
  if (samples.length === 0) {
    return [];
  }

  const sorted = [...samples].sort((a, b) => a.timestamp_ms - b.timestamp_ms);
  const anchors = toMinuteAnchors(sorted);
  const first = anchors[0].minute;
  const last = anchors[anchors.length - 1].minute;

  if (last - first + 1 > maxGridMinutes) {
    throw new SampleFormatError(
      `Samples span ${last - first + 1} minutes, more than the ${maxGridMinutes} minute limit`
    );
  }

  const grid: ResampledPoint[] = [];
  let k = 0;

  for (let minute = first; minute <= last; minute++) {
    while (k < anchors.length - 1 && anchors[k + 1].minute <= minute) {
      k++;
    }

    const left = anchors[k];
    let supply_temp = left.supply_temp;
    let return_temp = left.return_temp;

    if (left.minute !== minute) {
      const right = anchors[k + 1];
      const fraction = (minute - left.minute) / (right.minute - left.minute);
      supply_temp = lerp(left.supply_temp, right.supply_temp, fraction);
      return_temp = lerp(left.return_temp, right.return_temp, fraction);
    }

    grid.push({
      minute_offset: minute - first,
      timestamp_ms: minute * MS_PER_MINUTE,
      supply_temp,
      return_temp,
    });
  }

  return grid;
};
