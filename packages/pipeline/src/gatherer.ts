import type { OpenDataClient } from './client';
import { discover, type DiscoveredResource } from './timeBuckets';

export const DATA_ARCHIVE_SUFFIX = '.zip';
export const STATION_DESCRIPTION_MARKER = 'Beschreibung_Stationen.txt';

function joinDirectory(root: string, ...segments: string[]): string {
  const base = root.endsWith('/') ? root : `${root}/`;
  return new URL(segments.map((segment) => `${encodeURIComponent(segment)}/`).join(''), base).toString();
}

export async function listResolutions(client: OpenDataClient, climateRootUrl: string): Promise<string[]> {
  return client.resolveIndex(climateRootUrl, { extensionFilter: '/', absolute: false });
}

export async function listParameters(
  client: OpenDataClient,
  climateRootUrl: string,
  resolution: string
): Promise<string[]> {
  return client.resolveIndex(joinDirectory(climateRootUrl, resolution), { extensionFilter: '/', absolute: false });
}

/**
 * Lists `<root>/<resolution>/<parameter>/` and every time-bucket subdirectory below it.
 * The result is the plain concatenation of those listings; duplicates are kept.
 */
export async function gatherResources(
  client: OpenDataClient,
  climateRootUrl: string,
  resolution: string,
  parameter: string
): Promise<DiscoveredResource[]> {
  const indexUri = joinDirectory(climateRootUrl, resolution, parameter);
  const topLevel = (await client.resolveIndex(indexUri)).map(discover);
  const gathered = [...topLevel];

  for (const entry of topLevel) {
    if (entry.bucket === null || !entry.uri.endsWith('/')) {
      continue;
    }
    const children = await client.resolveIndex(entry.uri);
    gathered.push(...children.map(discover));
  }
  return gathered;
}

export function selectDataArchives(
  resources: DiscoveredResource[],
  suffix: string = DATA_ARCHIVE_SUFFIX
): DiscoveredResource[] {
  return resources.filter((resource) => resource.uri.toLowerCase().endsWith(suffix));
}

export function selectStationDescriptions(
  resources: DiscoveredResource[],
  marker: string = STATION_DESCRIPTION_MARKER
): DiscoveredResource[] {
  return resources.filter((resource) => resource.uri.includes(marker));
}

/** Station id embedded in a data archive name, e.g. `10minutenwerte_TU_00003_akt.zip`. */
export function stationIdFromArchive(uri: string): string | null {
  const filename = uri.split('/').pop() ?? '';
  const match = /_(\d{5})(?:_|\.)/.exec(filename);
  return match?.[1] ?? null;
}
