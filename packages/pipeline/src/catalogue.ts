/**
 * Resolutions and parameters of the CDC climate tree that the parsers understand.
 * Used for argument checks before any request goes out; live discovery goes through
 * `listResolutions` / `listParameters`.
 */
export const KNOWN_PARAMETERS = {
  '10_minutes': ['air_temperature', 'extreme_temperature', 'extreme_wind', 'precipitation', 'solar', 'wind'],
  '1_minute': ['precipitation'],
  hourly: [
    'air_temperature',
    'cloud_type',
    'cloudiness',
    'dew_point',
    'precipitation',
    'pressure',
    'soil_temperature',
    'solar',
    'sun',
    'visibility',
    'wind',
    'wind_synop'
  ],
  daily: ['kl', 'more_precip', 'soil_temperature', 'solar', 'water_equiv', 'weather_phenomena']
} as const satisfies Record<string, readonly string[]>;

export type Resolution = keyof typeof KNOWN_PARAMETERS;

export const RESOLUTIONS: Resolution[] = Object.keys(KNOWN_PARAMETERS).filter(isResolution);

export function isResolution(value: string): value is Resolution {
  return Object.prototype.hasOwnProperty.call(KNOWN_PARAMETERS, value);
}

export function isKnownParameter(resolution: Resolution, parameter: string): boolean {
  const parameters: readonly string[] = KNOWN_PARAMETERS[resolution];
  return parameters.includes(parameter);
}
