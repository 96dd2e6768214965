export * from './context';
export * from './forecasts';
export * from './observations';
export * from './stations';
