import path from 'node:path';
import { gatherResources, selectStationDescriptions } from '../gatherer';
import { dedupStations } from '../normalize';
import { parseObservationRequest } from '../requests';
import { fetchStationTable } from '../resources';
import { stationsTable } from '../tables';
import type { DiscoveredResource } from '../timeBuckets';
import type { Station } from '../types';
import { writeDataset } from '../writer';
import type { FlowContext, FlowFailure } from './context';

export interface StationsFlowInput {
  resolution: string;
  parameter: string;
}

export interface StationCollection {
  stations: Station[];
  failed: FlowFailure[];
}

export interface StationsFlowResult extends StationCollection {
  files: string[];
}

/**
 * Fetches and parses the station descriptions among gathered resources. Failed
 * descriptions are logged and reported; the rest still count.
 */
export async function collectStations(context: FlowContext, resources: DiscoveredResource[]): Promise<StationCollection> {
  const descriptions = selectStationDescriptions(resources);

  const collected: Station[] = [];
  const failed: FlowFailure[] = [];
  for (const description of descriptions) {
    const result = await fetchStationTable(context.client, description.uri);
    if (result.ok) {
      collected.push(...result.value);
    } else {
      context.logger.warn({ uri: description.uri, err: result.error }, 'Skipping station description');
      failed.push({ uri: description.uri, message: result.error.message });
    }
  }
  return { stations: dedupStations(collected), failed };
}

export async function runStationsFlow(context: FlowContext, input: StationsFlowInput): Promise<StationsFlowResult> {
  const { resolution, parameter } = parseObservationRequest(input);
  const resources = await gatherResources(context.client, context.config.climateRootUrl, resolution, parameter);
  const { stations, failed } = await collectStations(context, resources);
  const directory = path.join(context.config.dataDir, 'stations', parameter);
  const { files } = await writeDataset(stationsTable(stations), { directory, partitionByDate: false });

  context.logger.info(
    { resolution, parameter, stations: stations.length, failed: failed.length },
    'Station flow finished'
  );
  return { stations, files, failed };
}
