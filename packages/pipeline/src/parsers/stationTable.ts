import { StructuralParseError } from '../errors';
import { parseCompactTimestamp } from '../dates';
import { lookupColumn, STATION_COLUMNS, type ColumnDefinition, type ColumnTable } from '../schema';
import type { Station } from '../types';
import { decodeLatin1, parseFloatCell, parseIntegerCell, padStationId, parseTextCell, splitLines } from '../values';

type Cell = string | number | Date | null;

const SEPARATOR_LINE = /^[\s-]*$/;

export interface StationTableOptions {
  source?: string;
  columns?: ColumnTable;
}

/**
 * Splits a whitespace aligned row into one value per column. The single free-text column
 * (station name) takes whatever tokens the fixed columns on either side leave over.
 */
function splitRow(line: string, columns: ColumnDefinition[], source: string, lineNumber: number): string[] {
  const tokens = line.trim().split(/\s+/);
  const freeIndex = columns.findIndex((column) => column.freeText === true);

  if (tokens.length < columns.length || (freeIndex < 0 && tokens.length !== columns.length)) {
    throw new StructuralParseError(
      `line ${lineNumber} has ${tokens.length} fields, expected ${columns.length}`,
      { source }
    );
  }
  if (freeIndex < 0) {
    return tokens;
  }

  const trailing = columns.length - freeIndex - 1;
  const freeEnd = tokens.length - trailing;
  return [...tokens.slice(0, freeIndex), tokens.slice(freeIndex, freeEnd).join(' '), ...tokens.slice(freeEnd)];
}

function castCell(raw: string, column: ColumnDefinition, source: string): Cell {
  switch (column.type) {
    case 'string':
      return parseTextCell(raw);
    case 'int64':
      return parseIntegerCell(raw, { source, parameter: column.name });
    case 'float64':
      return parseFloatCell(raw, { source, parameter: column.name });
    case 'date':
      return parseCompactTimestamp(raw, 'YYYYMMDD');
  }
}

function dateOf(cell: Cell | undefined): Date | null {
  return cell instanceof Date ? cell : null;
}

function numberOf(cell: Cell | undefined): number | null {
  return typeof cell === 'number' ? cell : null;
}

function textOf(cell: Cell | undefined): string | null {
  return typeof cell === 'string' ? cell : null;
}

/**
 * Parses a station description listing (`*Beschreibung_Stationen.txt`). Bytes are decoded as
 * Latin-1; the first line names the columns and separator lines below it are skipped.
 */
export function parseStationTable(content: Uint8Array | string, options: StationTableOptions = {}): Station[] {
  const source = options.source ?? 'station table';
  const table = options.columns ?? STATION_COLUMNS;
  const lines = splitLines(decodeLatin1(content));

  const headerLine = lines[0]?.trim() ?? '';
  if (!headerLine) {
    throw new StructuralParseError('missing header line', { source });
  }
  const columns = headerLine.split(/\s+/).map((name) => lookupColumn(table, name, 'string'));
  if (!columns.some((column) => column.name === 'station_id')) {
    throw new StructuralParseError('header has no station id column', { source });
  }

  let index = 1;
  while (index < lines.length && SEPARATOR_LINE.test(lines[index] ?? '')) {
    index += 1;
  }

  const stations: Station[] = [];
  for (; index < lines.length; index += 1) {
    const line = lines[index] ?? '';
    if (!line.trim()) {
      continue;
    }
    const values = splitRow(line, columns, source, index + 1);
    const cells = new Map<string, Cell>();
    columns.forEach((column, position) => {
      cells.set(column.name, castCell(values[position] ?? '', column, source));
    });

    const stationId = textOf(cells.get('station_id'));
    if (!stationId) {
      throw new StructuralParseError(`line ${index + 1} has no station id`, { source });
    }
    stations.push({
      stationId: padStationId(stationId),
      dateStart: dateOf(cells.get('date_start')),
      dateEnd: dateOf(cells.get('date_end')),
      height: numberOf(cells.get('height')),
      geoLat: numberOf(cells.get('geo_lat')),
      geoLon: numberOf(cells.get('geo_lon')),
      name: textOf(cells.get('name')),
      state: textOf(cells.get('state'))
    });
  }
  return stations;
}
