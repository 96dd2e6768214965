import type { ResourceUri } from './resourceIndex';

export const TIME_BUCKETS = ['historical', 'recent', 'now'] as const;

export type TimeBucket = (typeof TIME_BUCKETS)[number];

export interface DiscoveredResource {
  uri: ResourceUri;
  bucket: TimeBucket | null;
}

const FILENAME_MARKERS: ReadonlyArray<[RegExp, TimeBucket]> = [
  [/_hist(\.[a-z0-9]+)?$/i, 'historical'],
  [/_akt(\.[a-z0-9]+)?$/i, 'recent'],
  [/_now(\.[a-z0-9]+)?$/i, 'now']
];

function pathSegments(uri: string): string[] {
  let pathname: string;
  try {
    pathname = new URL(uri).pathname;
  } catch {
    pathname = uri;
  }
  return pathname.split('/').filter((segment) => segment.length > 0);
}

function isTimeBucket(value: string): value is TimeBucket {
  return TIME_BUCKETS.some((bucket) => bucket === value);
}

/**
 * Directory segments (`historical/`, `recent/`, `now/`) win over filename markers
 * (`_hist`, `_akt`, `_now`).
 */
export function classifyTimeBucket(uri: string): TimeBucket | null {
  const segments = pathSegments(uri);
  for (let index = segments.length - 1; index >= 0; index -= 1) {
    const segment = segments[index];
    if (segment !== undefined && isTimeBucket(segment)) {
      return segment;
    }
  }

  const filename = segments[segments.length - 1] ?? '';
  for (const [pattern, bucket] of FILENAME_MARKERS) {
    if (pattern.test(filename)) {
      return bucket;
    }
  }
  return null;
}

export function discover(uri: ResourceUri): DiscoveredResource {
  return { uri, bucket: classifyTimeBucket(uri) };
}

export function isRollingBucket(bucket: TimeBucket | null): boolean {
  return bucket === 'recent' || bucket === 'now';
}
