export interface Station {
  stationId: string;
  dateStart: Date | null;
  dateEnd: Date | null;
  /** Metres above sea level; negative near the coast. */
  height: number | null;
  geoLat: number | null;
  geoLon: number | null;
  name: string | null;
  state: string | null;
}

export interface MeasurementRecord {
  stationId: string;
  dateStart: Date | null;
  /** Quality level (QN); higher is more thoroughly checked. */
  qualityLevel: number | null;
  values: Record<string, number | null>;
}

export interface ForecastMetadata {
  productId: string;
  generatingProcess: string;
  dateIssued: Date;
}

export interface ForecastRecord extends ForecastMetadata {
  stationId: string;
  dateStart: Date;
  values: Record<string, number | null>;
}

export interface ForecastStation {
  stationId: string;
  stationName: string | null;
  geoLat: number;
  geoLon: number;
  height: number;
}

export interface ParsedForecast {
  metadata: ForecastMetadata;
  timesteps: Date[];
  records: ForecastRecord[];
  stations: ForecastStation[] | null;
}

export interface StationLookupEntry {
  forecastStationId: string;
  observationStationId: string;
}
