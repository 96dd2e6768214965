import { isForecastMember, isMeasurementMember, readArchiveMember } from './archive';
import type { OpenDataClient } from './client';
import type { MeasurementTimestampFormat } from './dates';
import { settle, type Result } from './errors';
import { parseForecastDocument, type ForecastDocumentOptions } from './parsers/forecastDocument';
import { parseMeasurementTable } from './parsers/measurementTable';
import { parseStationTable } from './parsers/stationTable';
import type { MeasurementRecord, ParsedForecast, Station } from './types';

/** Marker of the rolling alias in the MOSMIX listing, a copy of the newest run. */
export const LATEST_FORECAST_MARKER = 'LATEST';
export const FORECAST_ARCHIVE_SUFFIX = '.kmz';

function isArchive(uri: string, suffix: string): boolean {
  return uri.toLowerCase().endsWith(suffix);
}

export function fetchStationTable(client: OpenDataClient, uri: string): Promise<Result<Station[]>> {
  return settle(async () => parseStationTable(await client.fetchBytes(uri), { source: uri }));
}

/** Downloads a measurement archive (or bare `produkt` file) and parses its data member. */
export function fetchMeasurementTable(
  client: OpenDataClient,
  uri: string,
  options: { timestampFormat?: MeasurementTimestampFormat } = {}
): Promise<Result<MeasurementRecord[]>> {
  return settle(async () => {
    const bytes = await client.fetchBytes(uri);
    const content = isArchive(uri, '.zip') ? readArchiveMember(bytes, isMeasurementMember, uri).content : bytes;
    return parseMeasurementTable(content, { source: uri, timestampFormat: options.timestampFormat });
  });
}

export function fetchForecastDocument(
  client: OpenDataClient,
  uri: string,
  options: Omit<ForecastDocumentOptions, 'source'> = {}
): Promise<Result<ParsedForecast>> {
  return settle(async () => {
    const bytes = await client.fetchBytes(uri);
    const content = isArchive(uri, FORECAST_ARCHIVE_SUFFIX)
      ? readArchiveMember(bytes, isForecastMember, uri).content
      : bytes;
    return parseForecastDocument(content, { ...options, source: uri });
  });
}

/** MOSMIX runs in the listing, without the `LATEST` alias. */
export async function listForecastDocuments(client: OpenDataClient, listingUri: string): Promise<string[]> {
  const uris = await client.resolveIndex(listingUri, { extensionFilter: FORECAST_ARCHIVE_SUFFIX });
  return uris.filter((uri) => !uri.includes(LATEST_FORECAST_MARKER));
}
