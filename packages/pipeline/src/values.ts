import { StructuralParseError, type StructuralParseLocation } from './errors';
import { NULL_SENTINELS, STATION_ID_WIDTH } from './schema';

const FLOAT_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const INTEGER_PATTERN = /^[-+]?\d+$/;

export function isNullCell(raw: string): boolean {
  const trimmed = raw.trim();
  return trimmed.length === 0 || NULL_SENTINELS.has(trimmed);
}

export function parseFloatCell(raw: string, location: StructuralParseLocation): number | null {
  if (isNullCell(raw)) {
    return null;
  }
  const trimmed = raw.trim();
  if (!FLOAT_PATTERN.test(trimmed)) {
    throw new StructuralParseError(`expected a number, found "${trimmed}"`, location);
  }
  return Number(trimmed);
}

export function parseIntegerCell(raw: string, location: StructuralParseLocation): number | null {
  if (isNullCell(raw)) {
    return null;
  }
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new StructuralParseError(`expected an integer, found "${trimmed}"`, location);
  }
  return Number.parseInt(trimmed, 10);
}

export function parseTextCell(raw: string): string | null {
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Canonical station id: trimmed and left-padded with zeros to five characters, so ids from
 * station tables, measurement files and forecasts compare equal.
 */
export function padStationId(raw: string | number): string {
  return String(raw).trim().padStart(STATION_ID_WIDTH, '0');
}

export function decodeLatin1(content: Uint8Array | string): string {
  return typeof content === 'string' ? content : Buffer.from(content).toString('latin1');
}

export function decodeUtf8(content: Uint8Array | string): string {
  return typeof content === 'string' ? content : Buffer.from(content).toString('utf8');
}

const XML_ENCODING = /^<\?xml[^>]*\bencoding\s*=\s*["']([^"']+)["']/i;
const LATIN1_ENCODINGS = new Set(['iso-8859-1', 'iso8859-1', 'latin1', 'latin-1', 'l1']);

/** Decodes an XML document with the charset named in its declaration, UTF-8 otherwise. */
export function decodeXml(content: Uint8Array | string): string {
  if (typeof content === 'string') {
    return content;
  }
  const prolog = Buffer.from(content.subarray(0, 200)).toString('latin1');
  const encoding = XML_ENCODING.exec(prolog)?.[1]?.toLowerCase();
  return encoding && LATIN1_ENCODINGS.has(encoding) ? decodeLatin1(content) : decodeUtf8(content);
}

export function splitLines(text: string): string[] {
  return text.replace(/^\uFEFF/, '').split(/\r?\n/);
}
