export type ColumnType = 'string' | 'int64' | 'float64' | 'date';

export interface ColumnDefinition {
  /** Header name in the source file. */
  readonly source: string;
  /** Canonical column name in the dataset. */
  readonly name: string;
  readonly type: ColumnType;
  /** Value may contain spaces in a whitespace aligned table. */
  readonly freeText?: boolean;
}

export type ColumnTable = ReadonlyArray<ColumnDefinition>;

export const STATION_ID_WIDTH = 5;

export const NULL_SENTINELS: ReadonlySet<string> = new Set(['-999']);

export const STATION_COLUMNS: ColumnTable = Object.freeze([
  { source: 'Stations_id', name: 'station_id', type: 'string' },
  { source: 'von_datum', name: 'date_start', type: 'date' },
  { source: 'bis_datum', name: 'date_end', type: 'date' },
  { source: 'Stationshoehe', name: 'height', type: 'int64' },
  { source: 'geoBreite', name: 'geo_lat', type: 'float64' },
  { source: 'geoLaenge', name: 'geo_lon', type: 'float64' },
  { source: 'Stationsname', name: 'name', type: 'string', freeText: true },
  { source: 'Bundesland', name: 'state', type: 'string' }
] as const);

export const MEASUREMENT_COLUMNS: ColumnTable = Object.freeze([
  { source: 'STATIONS_ID', name: 'station_id', type: 'string' },
  { source: 'MESS_DATUM', name: 'date_start', type: 'date' },
  { source: 'QN', name: 'QN', type: 'int64' },
  { source: 'PP_10', name: 'PP_10', type: 'float64' },
  { source: 'TT_10', name: 'TT_10', type: 'float64' },
  { source: 'TM5_10', name: 'TM5_10', type: 'float64' },
  { source: 'RF_10', name: 'RF_10', type: 'float64' },
  { source: 'TD_10', name: 'TD_10', type: 'float64' }
] as const);

/** End-of-record marker column of measurement files. */
export const END_OF_RECORD_COLUMN = 'eor';

/** Columns not in the table keep their header name and are read as float64. */
export function lookupColumn(table: ColumnTable, source: string, fallback: ColumnType = 'float64'): ColumnDefinition {
  return table.find((column) => column.source === source) ?? { source, name: source, type: fallback };
}
