import { isRollingBucket, type DiscoveredResource } from './timeBuckets';
import type { MeasurementRecord, Station } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DateWindow {
  /** Inclusive. */
  dateStart?: Date;
  /** Exclusive. */
  dateEnd?: Date;
}

function inWindow(date: Date | null, window: DateWindow): boolean {
  if (!window.dateStart && !window.dateEnd) {
    return true;
  }
  if (!date) {
    return false;
  }
  if (window.dateStart && date.getTime() < window.dateStart.getTime()) {
    return false;
  }
  if (window.dateEnd && date.getTime() >= window.dateEnd.getTime()) {
    return false;
  }
  return true;
}

function timeOf(date: Date | null): number {
  return date ? date.getTime() : Number.NEGATIVE_INFINITY;
}

function compareMeasurements(left: MeasurementRecord, right: MeasurementRecord): number {
  if (left.stationId !== right.stationId) {
    return left.stationId < right.stationId ? -1 : 1;
  }
  const leftTime = timeOf(left.dateStart);
  const rightTime = timeOf(right.dateStart);
  return leftTime === rightTime ? 0 : leftTime < rightTime ? -1 : 1;
}

/**
 * Resolves the overlap between historical and rolling series: one row per
 * (station, timestamp) survives, the one with the highest quality level, and the last of
 * those when levels tie. Rows outside the window are dropped first. Rows without a timestamp
 * are never merged; they survive when no window is given and sort first within their station.
 * Output is ordered by station and timestamp.
 */
export function dedupMeasurements(records: Iterable<MeasurementRecord>, window: DateWindow = {}): MeasurementRecord[] {
  const survivors = new Map<string, MeasurementRecord>();
  const undated: MeasurementRecord[] = [];
  for (const record of records) {
    if (!inWindow(record.dateStart, window)) {
      continue;
    }
    if (!record.dateStart) {
      undated.push(record);
      continue;
    }
    const key = `${record.stationId}|${record.dateStart.getTime()}`;
    const current = survivors.get(key);
    const rank = record.qualityLevel ?? Number.NEGATIVE_INFINITY;
    if (!current || rank >= (current.qualityLevel ?? Number.NEGATIVE_INFINITY)) {
      survivors.set(key, record);
    }
  }
  return [...undated, ...survivors.values()].sort(compareMeasurements);
}

function stationKey(station: Station): string {
  return JSON.stringify([
    station.stationId,
    station.dateStart?.toISOString() ?? null,
    station.dateEnd?.toISOString() ?? null,
    station.height,
    station.geoLat,
    station.geoLon,
    station.name,
    station.state
  ]);
}

/** Drops rows identical in every column, keeping the first. */
export function dedupStations(stations: Iterable<Station>): Station[] {
  const seen = new Set<string>();
  const unique: Station[] = [];
  for (const station of stations) {
    const key = stationKey(station);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(station);
    }
  }
  return unique;
}

export interface ResourceWindowOptions extends DateWindow {
  now?: Date;
  recentWindowDays: number;
}

/**
 * Narrows the resources to fetch for a date range. Rolling (`recent`/`now`) resources are
 * the only ones kept when the whole range lies inside the recent window, and are dropped
 * when the range ends before it in an earlier year. Resources without a bucket are always
 * kept, as is everything when the range straddles the window start.
 */
export function selectResourcesForWindow(
  resources: DiscoveredResource[],
  options: ResourceWindowOptions
): DiscoveredResource[] {
  const now = options.now ?? new Date();
  const windowStart = now.getTime() - options.recentWindowDays * DAY_MS;

  const onlyRolling = options.dateStart !== undefined && options.dateStart.getTime() >= windowStart;
  const noRolling =
    options.dateEnd !== undefined &&
    options.dateEnd.getUTCFullYear() < now.getUTCFullYear() &&
    options.dateEnd.getTime() <= windowStart;

  return resources.filter((resource) => {
    if (resource.bucket === null) {
      return true;
    }
    const rolling = isRollingBucket(resource.bucket);
    if (onlyRolling && !rolling) {
      return false;
    }
    if (noRolling && rolling) {
      return false;
    }
    return true;
  });
}

export type PartitionColumns = {
  date_start__year: number;
  date_start__month: number;
  date_start__day: number;
};

export const PARTITION_COLUMN_NAMES = ['date_start__year', 'date_start__month', 'date_start__day'] as const;

export function partitionColumns(date: Date): PartitionColumns {
  return {
    date_start__year: date.getUTCFullYear(),
    date_start__month: date.getUTCMonth() + 1,
    date_start__day: date.getUTCDate()
  };
}
