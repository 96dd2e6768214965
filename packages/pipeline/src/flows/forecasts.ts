import path from 'node:path';
import { parseForecastRequest, type ForecastRequestInput } from '../requests';
import { fetchForecastDocument, listForecastDocuments } from '../resources';
import { loadStationLookup } from '../stationLookup';
import { forecastStationsTable, forecastsTable } from '../tables';
import type { ForecastStation } from '../types';
import { writeDataset } from '../writer';
import type { FlowContext, FlowFailure } from './context';

export interface ForecastsFlowResult {
  documents: number;
  rowCount: number;
  stationCount: number;
  files: string[];
  failed: FlowFailure[];
}

async function resolveStationFilter(
  context: FlowContext,
  requested: string[] | undefined,
  allStations: boolean
): Promise<string[] | undefined> {
  if (requested) {
    return requested;
  }
  if (allStations) {
    return undefined;
  }
  const lookup = await loadStationLookup(context.config.stationLookupPath);
  context.logger.info(
    { path: context.config.stationLookupPath, stations: lookup.length },
    'Restricting forecasts to stations from the lookup table'
  );
  return lookup.map((entry) => entry.forecastStationId);
}

/**
 * Fetches every MOSMIX_S run in the listing and writes its forecast rows to `forecasts` as
 * soon as the document is parsed. Station coordinates, first seen wins, go to
 * `forecast_stations` once all documents are done.
 */
export async function runForecastsFlow(
  context: FlowContext,
  input: ForecastRequestInput = {}
): Promise<ForecastsFlowResult> {
  const request = parseForecastRequest(input);
  const { client, config, logger } = context;

  const stationIds = await resolveStationFilter(context, request.stationIds, request.allStations);
  const documents = await listForecastDocuments(client, config.mosmixListingUrl);
  logger.info({ documents: documents.length }, 'Fetching forecast documents');

  const forecastsDirectory = path.join(config.dataDir, 'forecasts');
  const stations = new Map<string, ForecastStation>();
  const files: string[] = [];
  const failed: FlowFailure[] = [];
  let rowCount = 0;
  for (const uri of documents) {
    const result = await fetchForecastDocument(client, uri, {
      stationIds,
      parameters: request.parameters,
      includeStations: request.includeStations
    });
    if (!result.ok) {
      logger.warn({ uri, err: result.error }, 'Skipping forecast document');
      failed.push({ uri, message: result.error.message });
      continue;
    }
    for (const station of result.value.stations ?? []) {
      if (!stations.has(station.stationId)) {
        stations.set(station.stationId, station);
      }
    }
    const written = await writeDataset(forecastsTable(result.value.records), {
      directory: forecastsDirectory,
      partitionByDate: config.partitionByDate
    });
    logger.debug({ uri, rows: written.rowCount }, 'Wrote forecast document');
    files.push(...written.files);
    rowCount += written.rowCount;
  }

  if (request.includeStations) {
    const stationFiles = await writeDataset(forecastStationsTable([...stations.values()]), {
      directory: path.join(config.dataDir, 'forecast_stations'),
      partitionByDate: false
    });
    files.push(...stationFiles.files);
  }

  logger.info(
    { documents: documents.length, rows: rowCount, stations: stations.size, failed: failed.length },
    'Forecast flow finished'
  );
  return { documents: documents.length, rowCount, stationCount: stations.size, files, failed };
}
