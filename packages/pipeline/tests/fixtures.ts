import { DWD_NAMESPACE, KML_NAMESPACE } from '../src/parsers/forecastDocument';

export type PlacemarkFixture = {
  id: string;
  name: string;
  coordinates: string;
  forecasts: Record<string, string>;
};

export const FORECAST_TIMESTEPS = ['2026-10-19T10:00:00.000Z', '2026-10-19T11:00:00.000Z', '2026-10-19T12:00:00.000Z'];

export const BERLIN_PLACEMARKS: PlacemarkFixture[] = [
  {
    id: '10381',
    name: 'BERLIN-DAHLEM',
    coordinates: '13.30,52.45,51.0',
    forecasts: { TTT: '  285.15   -\n   286.35 ', FF: '3.1 3.6 4.0' }
  },
  {
    id: 'K2910',
    name: 'KLEIN MACHNOW',
    coordinates: '13.23,52.39,43.0',
    forecasts: { TTT: '284.95 285.05 285.95', FF: '2.1 - -' }
  }
];

/** Builds a MOSMIX style KML document. */
export function mosmixKml(
  placemarks: PlacemarkFixture[] = BERLIN_PLACEMARKS,
  timesteps: string[] = FORECAST_TIMESTEPS
): string {
  const steps = timesteps.map((step) => `<dwd:TimeStep>${step}</dwd:TimeStep>`).join('');
  const marks = placemarks
    .map((placemark) => {
      const forecasts = Object.entries(placemark.forecasts)
        .map(
          ([element, values]) =>
            `<dwd:Forecast dwd:elementName="${element}"><dwd:value>${values}</dwd:value></dwd:Forecast>`
        )
        .join('');
      return [
        '<kml:Placemark>',
        `<kml:name>${placemark.id}</kml:name>`,
        `<kml:description>${placemark.name}</kml:description>`,
        `<kml:ExtendedData>${forecasts}</kml:ExtendedData>`,
        `<kml:Point><kml:coordinates>${placemark.coordinates}</kml:coordinates></kml:Point>`,
        '</kml:Placemark>'
      ].join('');
    })
    .join('\n');

  return [
    '<?xml version="1.0" encoding="ISO-8859-1" standalone="yes"?>',
    `<kml:kml xmlns:dwd="${DWD_NAMESPACE}" xmlns:gx="http://www.google.com/kml/ext/2.2" xmlns:kml="${KML_NAMESPACE}">`,
    '<kml:Document>',
    '<kml:ExtendedData>',
    '<dwd:ProductDefinition>',
    '<dwd:Issuer>Deutscher Wetterdienst</dwd:Issuer>',
    '<dwd:ProductID>MOSMIX</dwd:ProductID>',
    '<dwd:GeneratingProcess>DMO-RMOS-TEST</dwd:GeneratingProcess>',
    '<dwd:IssueTime>2026-10-19T09:00:00.000Z</dwd:IssueTime>',
    `<dwd:ForecastTimeSteps>${steps}</dwd:ForecastTimeSteps>`,
    '</dwd:ProductDefinition>',
    '</kml:ExtendedData>',
    marks,
    '</kml:Document>',
    '</kml:kml>'
  ].join('\n');
}
