import fs from 'fs';
import csv from 'csv-parser';
import { SensorSample } from '@/types/heating.types';
import { parseDate } from '@/utils/date.utils';
import { logger } from '@/utils/logger';

type CSVRow = Record<string, string | undefined>;

export interface SampleLoaderResult {
  success: boolean;
  file: string;
  samples: SensorSample[];
  total_rows: number;
  errors: string[];
  processing_time_ms: number;
}

const TIMESTAMP_COLUMNS = ['timestamp', 'datetime', 'time'];
const SUPPLY_COLUMNS = ['supply_temp', 'supply'];
const RETURN_COLUMNS = ['return_temp', 'return'];

const pickColumn = (row: CSVRow, names: string[]): string | undefined => {
  for (const name of names) {
    const value = row[name];
    if (value !== undefined && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
};

/**
 * Normalize header names: lowercase, trimmed, BOM removed
 */
const normalizeHeader = ({ header }: { header: string }): string =>
  header.replace(/^\uFEFF/, '').trim().toLowerCase();

/**
 * Load supply/return temperature samples from a CSV export.
 * Rows with an unparseable timestamp or temperature are skipped and reported.
 */
export async function loadSamplesFromCSV(csvFilePath: string): Promise<SampleLoaderResult> {
  const startTime = Date.now();
  const result: SampleLoaderResult = {
    success: false,
    file: csvFilePath,
    samples: [],
    total_rows: 0,
    errors: [],
    processing_time_ms: 0,
  };

  try {
    if (!fs.existsSync(csvFilePath)) {
      throw new Error(`CSV file not found: ${csvFilePath}`);
    }

    await new Promise<void>((resolve, reject) => {
      // pipe() does not forward read errors (EISDIR, EACCES) to the parser
      const source = fs.createReadStream(csvFilePath).on('error', (error: Error) => reject(error));

      source
        .pipe(csv({ mapHeaders: normalizeHeader }))
        .on('data', (row: CSVRow) => {
          result.total_rows++;
          const line = result.total_rows + 1;

          const timestamp = pickColumn(row, TIMESTAMP_COLUMNS);
          if (!timestamp || parseDate(timestamp) === null) {
            result.errors.push(`Line ${line}: invalid timestamp: ${timestamp ?? '(missing)'}`);
            return;
          }

          const supply = parseFloat(pickColumn(row, SUPPLY_COLUMNS) ?? '');
          const ret = parseFloat(pickColumn(row, RETURN_COLUMNS) ?? '');
          if (isNaN(supply) || isNaN(ret)) {
            result.errors.push(`Line ${line}: invalid temperature value`);
            return;
          }

          result.samples.push({ timestamp, supply_temp: supply, return_temp: ret });
        })
        .on('end', () => resolve())
        .on('error', (error: Error) => reject(error));
    });

    result.success = true;
    logger.info(`Parsed ${result.total_rows} rows into ${result.samples.length} samples`, {
      file: csvFilePath,
      skipped: result.errors.length,
    });
  } catch (error) {
    result.errors.push(error instanceof Error ? error.message : 'Unknown error');
    logger.error(`Failed to load samples from ${csvFilePath}`, { errors: result.errors });
  }

  result.processing_time_ms = Date.now() - startTime;
  return result;
}
