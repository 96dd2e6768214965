export type CompactTimestampFormat = 'YYYYMMDDHHMM' | 'YYYYMMDDHH' | 'YYYYMMDD' | 'YYMMDDHHMM';

const FORMAT_LENGTHS: Record<CompactTimestampFormat, number> = {
  YYYYMMDDHHMM: 12,
  YYYYMMDDHH: 10,
  YYYYMMDD: 8,
  YYMMDDHHMM: 10
};

/** Years 00-68 belong to 2000-2068, 69-99 to 1969-1999. */
export function pivotTwoDigitYear(year: number): number {
  return year <= 68 ? 2000 + year : 1900 + year;
}

function utcDate(year: number, month: number, day: number, hour: number, minute: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute));
  // Date.UTC rolls 31 April into 1 May; reject instead.
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  if (year < 100) {
    date.setUTCFullYear(year);
  }
  return date;
}

function digits(text: string, start: number, length: number): number {
  return Number.parseInt(text.slice(start, start + length), 10);
}

/**
 * Parses a digits-only UTC timestamp. Anything that does not fit the format, including
 * impossible calendar values, yields `null`.
 */
export function parseCompactTimestamp(raw: string, format: CompactTimestampFormat): Date | null {
  const text = raw.trim();
  if (text.length !== FORMAT_LENGTHS[format] || !/^\d+$/.test(text)) {
    return null;
  }

  switch (format) {
    case 'YYYYMMDDHHMM':
      return utcDate(digits(text, 0, 4), digits(text, 4, 2), digits(text, 6, 2), digits(text, 8, 2), digits(text, 10, 2));
    case 'YYYYMMDDHH':
      return utcDate(digits(text, 0, 4), digits(text, 4, 2), digits(text, 6, 2), digits(text, 8, 2), 0);
    case 'YYYYMMDD':
      return utcDate(digits(text, 0, 4), digits(text, 4, 2), digits(text, 6, 2), 0, 0);
    case 'YYMMDDHHMM':
      return parseLegacyTimestamp(text);
  }
}

/**
 * Two-digit-year timestamps (`YYMMDDHHMM`) found in some older series.
 */
export function parseLegacyTimestamp(raw: string): Date | null {
  const text = raw.trim();
  if (!/^\d{10}$/.test(text)) {
    return null;
  }
  return utcDate(
    pivotTwoDigitYear(digits(text, 0, 2)),
    digits(text, 2, 2),
    digits(text, 4, 2),
    digits(text, 6, 2),
    digits(text, 8, 2)
  );
}

export type MeasurementTimestampFormat = 'auto' | CompactTimestampFormat;

/** `auto` decides by length: 12 digits full, 8 digits date only, 10 digits the legacy form. */
export function parseMeasurementTimestamp(raw: string, format: MeasurementTimestampFormat): Date | null {
  if (format !== 'auto') {
    return parseCompactTimestamp(raw, format);
  }
  const text = raw.trim();
  switch (text.length) {
    case 12:
      return parseCompactTimestamp(text, 'YYYYMMDDHHMM');
    case 8:
      return parseCompactTimestamp(text, 'YYYYMMDD');
    case 10:
      return parseLegacyTimestamp(text);
    default:
      return null;
  }
}

export function timestampFormatForResolution(resolution: string): MeasurementTimestampFormat {
  switch (resolution) {
    case 'hourly':
      return 'YYYYMMDDHH';
    case 'daily':
    case 'monthly':
    case 'annual':
      return 'YYYYMMDD';
    default:
      return 'auto';
  }
}
