import { readFile } from 'node:fs/promises';
import { StructuralParseError } from './errors';
import type { StationLookupEntry } from './types';
import { padStationId, splitLines } from './values';

const FORECAST_COLUMN = 'forecasts_station_id';
const OBSERVATION_COLUMN = 'observations_station_id';

/**
 * Reads the forecast/observation station cross reference. The table is maintained by hand
 * and taken as given; only its shape is checked.
 */
export function parseStationLookup(text: string, source = 'station lookup'): StationLookupEntry[] {
  const lines = splitLines(text).filter((line) => line.trim().length > 0);
  const [headerLine, ...rows] = lines;
  const header = (headerLine ?? '').split(',').map((cell) => cell.trim());
  const forecastIndex = header.indexOf(FORECAST_COLUMN);
  const observationIndex = header.indexOf(OBSERVATION_COLUMN);
  if (forecastIndex < 0 || observationIndex < 0) {
    throw new StructuralParseError(`header must name ${FORECAST_COLUMN} and ${OBSERVATION_COLUMN}`, { source });
  }

  return rows.map((line, index) => {
    const cells = line.split(',').map((cell) => cell.trim());
    const forecastStationId = cells[forecastIndex];
    const observationStationId = cells[observationIndex];
    if (!forecastStationId || !observationStationId) {
      throw new StructuralParseError(`row ${index + 2} is incomplete`, { source });
    }
    return {
      forecastStationId: padStationId(forecastStationId),
      observationStationId: padStationId(observationStationId)
    };
  });
}

export async function loadStationLookup(filePath: string): Promise<StationLookupEntry[]> {
  return parseStationLookup(await readFile(filePath, 'utf8'), filePath);
}
