#!/usr/bin/env ts-node
/**
 * CLI script to run the day analysis over a CSV export of boiler samples
 *
 * Usage:
 *   npm run analyze-csv -- --file data/2025-01-14.csv --flow 12.5
 *   npm run analyze-csv -- --file data/2025-01-14.csv --flow 12.5 --date 2025-01-14 --previous 1520.4 --coefficient 1.12
 */

import { loadSamplesFromCSV } from '@/services/csv-sample-loader.service';
import { analyzeDay } from '@/services/day-analysis.service';
import { DayAnalysisInput } from '@/types/heating.types';
import { logger } from '@/utils/logger';

interface CLIArgs {
  file: string;
  flow?: number;
  date?: string;
  previous?: number;
  coefficient?: number;
  indoor?: number;
  solar?: number;
}

function parseNumberArg(name: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isFinite(parsed)) {
    throw new Error(`--${name} expects a number, got: ${value ?? '(missing)'}`);
  }
  return parsed;
}

function parseArgs(): CLIArgs {
  const args = process.argv.slice(2);
  const parsed: CLIArgs = {
    file: ''
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--file':
        parsed.file = args[++i] ?? '';
        break;
      case '--flow':
        parsed.flow = parseNumberArg('flow', args[++i]);
        break;
      case '--date':
        parsed.date = args[++i];
        break;
      case '--previous':
        parsed.previous = parseNumberArg('previous', args[++i]);
        break;
      case '--coefficient':
        parsed.coefficient = parseNumberArg('coefficient', args[++i]);
        break;
      case '--indoor':
        parsed.indoor = parseNumberArg('indoor', args[++i]);
        break;
      case '--solar':
        parsed.solar = parseNumberArg('solar', args[++i]);
        break;
    }
  }

  return parsed;
}

function printUsage() {
  console.log(`
Usage:
  npm run analyze-csv -- --file <csv_file> --flow <l/min> [options]

Options:
  --file <path>          CSV with timestamp, supply_temp, return_temp columns
  --flow <l/min>         Constant circuit flow rate
  --date <YYYY-MM-DD>    Calendar day, used for the solar gain estimate
  --previous <kWh>       Previous ghost meter reading (default 0)
  --coefficient <value>  Water-to-electricity coefficient (default 1.157)
  --indoor <°C>          Indoor temperature, enables the solar gain estimate
  --solar <W/m²>         Average solar irradiance for the day
  `);
}

async function main() {
  try {
    const args = parseArgs();

    if (!args.file || args.flow === undefined) {
      printUsage();
      process.exit(1);
    }

    const loaded = await loadSamplesFromCSV(args.file);
    if (!loaded.success) {
      logger.error(`Could not read ${args.file}: ${loaded.errors.join('; ')}`);
      process.exit(1);
    }

    if (loaded.errors.length > 0) {
      logger.warn(`Skipped ${loaded.errors.length} of ${loaded.total_rows} rows`);
      loaded.errors.slice(0, 10).forEach(error => logger.warn(`  ${error}`));
    }

    const input: DayAnalysisInput = {
      samples: loaded.samples,
      flow_rate: args.flow,
      date: args.date,
      previous_meter_value: args.previous,
      current_coefficient: args.coefficient,
      indoor_temperature: args.indoor,
      solar_avg: args.solar,
    };

    const result = analyzeDay(input);
    console.log(JSON.stringify(result, null, 2));

    process.exit(result.error === undefined ? 0 : 2);
  } catch (error) {
    logger.error('Analysis failed:', error);
    process.exit(1);
  }
}

void main();
