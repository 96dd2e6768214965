import path from 'node:path';
import { timestampFormatForResolution } from '../dates';
import { gatherResources, selectDataArchives, stationIdFromArchive } from '../gatherer';
import { dedupMeasurements, selectResourcesForWindow } from '../normalize';
import { assertStationsKnown, parseObservationRequest, type ObservationRequestInput } from '../requests';
import { fetchMeasurementTable } from '../resources';
import { measurementsTable } from '../tables';
import type { DiscoveredResource } from '../timeBuckets';
import type { MeasurementRecord } from '../types';
import { writeDataset } from '../writer';
import type { FlowContext, FlowFailure } from './context';
import { collectStations } from './stations';

export interface ObservationsFlowResult {
  resolution: string;
  parameter: string;
  archives: number;
  rowCount: number;
  files: string[];
  failed: FlowFailure[];
}

/**
 * Groups archives by the station id in their file name, in listing order. Archives
 * without a recognisable id form a group of their own.
 */
function groupArchivesByStation(archives: DiscoveredResource[]): DiscoveredResource[][] {
  const groups = new Map<string, DiscoveredResource[]>();
  for (const archive of archives) {
    const key = stationIdFromArchive(archive.uri) ?? archive.uri;
    const group = groups.get(key);
    if (group) {
      group.push(archive);
    } else {
      groups.set(key, [archive]);
    }
  }
  return [...groups.values()];
}

/**
 * Downloads, parses, deduplicates and writes the measurement archives of one
 * resolution/parameter, one station at a time so that only a single station's series is
 * held in memory. A failed archive is logged and listed in the result unless
 * `failFast` is set, in which case its error is thrown.
 */
export async function runObservationsFlow(
  context: FlowContext,
  input: ObservationRequestInput
): Promise<ObservationsFlowResult> {
  const request = parseObservationRequest(input);
  const { resolution, parameter } = request;
  const { client, config, logger } = context;

  const resources = await gatherResources(client, config.climateRootUrl, resolution, parameter);

  const requestedStations = request.stationIds ? new Set(request.stationIds) : null;
  if (requestedStations) {
    const { stations } = await collectStations(context, resources);
    if (stations.length > 0) {
      assertStationsKnown(requestedStations, stations);
    } else {
      logger.warn({ resolution, parameter }, 'No station list available, requested stations are not checked');
    }
  }

  const archives = selectResourcesForWindow(
    selectDataArchives(resources).filter((resource) => {
      const stationId = stationIdFromArchive(resource.uri);
      return !requestedStations || (stationId !== null && requestedStations.has(stationId));
    }),
    { dateStart: request.dateStart, dateEnd: request.dateEnd, recentWindowDays: config.recentWindowDays }
  );
  logger.info({ resolution, parameter, archives: archives.length }, 'Fetching measurement archives');

  const timestampFormat = timestampFormatForResolution(resolution);
  const directory = path.join(config.dataDir, resolution, parameter);
  const files: string[] = [];
  const failed: FlowFailure[] = [];
  let rowCount = 0;
  for (const group of groupArchivesByStation(archives)) {
    const records: MeasurementRecord[] = [];
    for (const archive of group) {
      const result = await fetchMeasurementTable(client, archive.uri, { timestampFormat });
      if (result.ok) {
        records.push(...result.value);
        continue;
      }
      if (request.failFast) {
        throw result.error;
      }
      logger.warn({ uri: archive.uri, err: result.error }, 'Skipping measurement archive');
      failed.push({ uri: archive.uri, message: result.error.message });
    }

    const deduplicated = dedupMeasurements(records, { dateStart: request.dateStart, dateEnd: request.dateEnd });
    const written = await writeDataset(measurementsTable(deduplicated), {
      directory,
      partitionByDate: config.partitionByDate
    });
    logger.debug({ archives: group.length, rows: written.rowCount }, 'Wrote station measurements');
    files.push(...written.files);
    rowCount += written.rowCount;
  }

  logger.info({ resolution, parameter, rows: rowCount, failed: failed.length }, 'Observation flow finished');
  return { resolution, parameter, archives: archives.length, rowCount, files, failed };
}
