import { DOMParser } from '@xmldom/xmldom';
import { StructuralParseError } from '../errors';
import type { ForecastMetadata, ForecastRecord, ForecastStation, ParsedForecast } from '../types';
import { decodeXml, padStationId } from '../values';

export const KML_NAMESPACE = 'http://www.opengis.net/kml/2.2';
export const DWD_NAMESPACE = 'https://opendata.dwd.de/weather/lib/pointforecast_dwd_extension_V1_0.xsd';

/** Placeholder DWD writes for a missing forecast value. */
export const MISSING_FORECAST_VALUE = '-';

export interface ForecastDocumentOptions {
  source?: string;
  /** Station ids to keep; compared after padding to five characters. */
  stationIds?: Iterable<string>;
  parameters?: Iterable<string>;
  includeStations?: boolean;
}

interface Namespaces {
  kml: string;
  dwd: string;
}

function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

function children(parent: Element, namespace: string, localName: string): Element[] {
  const matches: Element[] = [];
  for (let index = 0; index < parent.childNodes.length; index += 1) {
    const node = parent.childNodes.item(index);
    if (node && isElement(node) && node.namespaceURI === namespace && node.localName === localName) {
      matches.push(node);
    }
  }
  return matches;
}

class DocumentReader {
  constructor(
    private readonly namespaces: Namespaces,
    private readonly source: string
  ) {}

  namespace(prefix: keyof Namespaces): string {
    return this.namespaces[prefix];
  }

  fail(message: string, location: { stationId?: string; parameter?: string } = {}): never {
    throw new StructuralParseError(message, { source: this.source, ...location });
  }

  /** Follows a path of `prefix:name` steps, each resolved against its namespace. */
  path(start: Element, steps: string[]): Element[] {
    let current = [start];
    for (const step of steps) {
      const [prefix, localName] = step.split(':');
      const namespace = this.namespace(prefix === 'dwd' ? 'dwd' : 'kml');
      current = current.flatMap((element) => children(element, namespace, localName ?? ''));
    }
    return current;
  }

  one(start: Element, steps: string[]): Element {
    const [match] = this.path(start, steps);
    if (!match) {
      this.fail(`missing element ${steps.join('/')}`);
    }
    return match;
  }

  text(start: Element, steps: string[]): string {
    return (this.one(start, steps).textContent ?? '').trim();
  }

  optionalText(start: Element, steps: string[]): string | null {
    const [match] = this.path(start, steps);
    const text = match?.textContent?.trim();
    return text ? text : null;
  }

  timestamp(raw: string, what: string): Date {
    const value = new Date(raw);
    if (Number.isNaN(value.getTime())) {
      this.fail(`${what} "${raw}" is not a timestamp`);
    }
    return value;
  }
}

function parseXml(text: string, source: string): Element {
  const problems: string[] = [];
  const record = (message: string) => {
    problems.push(message.trim());
  };
  let root: Element | null = null;
  try {
    const parser = new DOMParser({ errorHandler: { error: record, fatalError: record } });
    root = parser.parseFromString(text, 'text/xml').documentElement;
  } catch (error) {
    record(error instanceof Error ? error.message : String(error));
  }
  if (problems.length > 0 || !root) {
    throw new StructuralParseError(`malformed XML${problems[0] ? `: ${problems[0]}` : ''}`, { source });
  }
  return root;
}

function parseValues(packed: string, reader: DocumentReader, stationId: string, parameter: string): Array<number | null> {
  const normalized = packed.replace(/\s+/g, ' ').trim();
  const tokens = normalized ? normalized.split(' ') : [];
  return tokens.map((token) => {
    if (token === MISSING_FORECAST_VALUE) {
      return null;
    }
    const value = Number(token);
    if (Number.isNaN(value)) {
      reader.fail(`value "${token}" is not a number`, { stationId, parameter });
    }
    return value;
  });
}

function parseCoordinates(raw: string, reader: DocumentReader, stationId: string): [number, number, number] {
  const parts = raw.split(',').map((part) => Number(part.trim()));
  const [lon, lat, height] = parts;
  if (parts.length !== 3 || lon === undefined || lat === undefined || height === undefined || parts.some(Number.isNaN)) {
    reader.fail(`coordinates "${raw}" are not a lon,lat,height triple`, { stationId });
  }
  return [lon, lat, height];
}

/**
 * Parses a MOSMIX KML document into one row per station and timestep, each carrying the
 * document metadata and one column per forecast element.
 *
 * Every element series must have exactly one value per timestep. The station filter
 * narrows the forecast rows only; with `includeStations` every placemark yields a station.
 */
export function parseForecastDocument(content: Uint8Array | string, options: ForecastDocumentOptions = {}): ParsedForecast {
  const source = options.source ?? 'forecast document';
  const root = parseXml(decodeXml(content), source);
  const reader: DocumentReader = new DocumentReader(
    {
      kml: root.lookupNamespaceURI('kml') ?? KML_NAMESPACE,
      dwd: root.lookupNamespaceURI('dwd') ?? DWD_NAMESPACE
    },
    source
  );

  const definition = reader.one(root, ['kml:Document', 'kml:ExtendedData', 'dwd:ProductDefinition']);
  const metadata: ForecastMetadata = {
    productId: reader.text(definition, ['dwd:ProductID']),
    generatingProcess: reader.text(definition, ['dwd:GeneratingProcess']),
    dateIssued: reader.timestamp(reader.text(definition, ['dwd:IssueTime']), 'IssueTime')
  };

  const timesteps = reader
    .path(definition, ['dwd:ForecastTimeSteps', 'dwd:TimeStep'])
    .map((step) => reader.timestamp((step.textContent ?? '').trim(), 'TimeStep'));
  for (let index = 1; index < timesteps.length; index += 1) {
    const previous = timesteps[index - 1];
    const current = timesteps[index];
    if (previous && current && current.getTime() <= previous.getTime()) {
      reader.fail(`timesteps are not strictly increasing at position ${index}`);
    }
  }

  const stationFilter = options.stationIds ? new Set([...options.stationIds].map(padStationId)) : null;
  const parameterFilter = options.parameters ? new Set(options.parameters) : null;

  const records: ForecastRecord[] = [];
  const stations: ForecastStation[] = [];

  for (const placemark of reader.path(root, ['kml:Document', 'kml:Placemark'])) {
    const stationId = padStationId(reader.text(placemark, ['kml:name']));
    if (options.includeStations) {
      const [geoLon, geoLat, height] = parseCoordinates(
        reader.text(placemark, ['kml:Point', 'kml:coordinates']),
        reader,
        stationId
      );
      stations.push({
        stationId,
        stationName: reader.optionalText(placemark, ['kml:description']),
        geoLat,
        geoLon,
        height
      });
    }
    if (stationFilter && !stationFilter.has(stationId)) {
      continue;
    }

    const series = new Map<string, Array<number | null>>();
    for (const forecast of reader.path(placemark, ['kml:ExtendedData', 'dwd:Forecast'])) {
      const parameter = forecast.getAttributeNS(reader.namespace('dwd'), 'elementName') ?? '';
      if (!parameter) {
        reader.fail('forecast element without a name', { stationId });
      }
      if (parameterFilter && !parameterFilter.has(parameter)) {
        continue;
      }
      const values = parseValues(reader.optionalText(forecast, ['dwd:value']) ?? '', reader, stationId, parameter);
      if (values.length !== timesteps.length) {
        reader.fail(`${values.length} values for ${timesteps.length} timesteps`, { stationId, parameter });
      }
      series.set(parameter, values);
    }

    timesteps.forEach((dateStart, position) => {
      const values: Record<string, number | null> = {};
      for (const [parameter, column] of series) {
        values[parameter] = column[position] ?? null;
      }
      records.push({ ...metadata, stationId, dateStart, values });
    });
  }

  return { metadata, timesteps, records, stations: options.includeStations ? stations : null };
}
