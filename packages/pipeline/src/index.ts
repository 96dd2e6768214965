export * from './archive';
export * from './catalogue';
export * from './client';
export * from './config';
export * from './dates';
export * from './errors';
export * from './flows';
export * from './gatherer';
export * from './normalize';
export * from './parsers/forecastDocument';
export * from './parsers/measurementTable';
export * from './parsers/stationTable';
export * from './requests';
export * from './resourceIndex';
export * from './resources';
export * from './schema';
export * from './stationLookup';
export * from './tables';
export * from './timeBuckets';
export * from './types';
export * from './values';
export * from './writer';
