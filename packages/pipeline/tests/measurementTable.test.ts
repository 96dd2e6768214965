import assert from 'node:assert/strict';
import { test } from 'node:test';
import { StructuralParseError } from '../src/errors';
import { parseMeasurementTable } from '../src/parsers/measurementTable';

const SERIES = [
  'STATIONS_ID;MESS_DATUM;  QN;PP_10;TT_10;TM5_10;RF_10;TD_10;eor',
  '         44;202301010000;    3;1002.5;   4.1;   3.2;  91.0;   2.8;eor',
  '         44;202301010010;    3;-999;   4.0;   3.1;  92.0;   2.8;eor',
  ''
].join('\n');

test('parseMeasurementTable trims fields and nulls sentinels', () => {
  const records = parseMeasurementTable(Buffer.from(SERIES, 'utf8'), { source: 'produkt_zehn_min_tu.txt' });

  assert.equal(records.length, 2);
  assert.deepEqual(records[0], {
    stationId: '00044',
    dateStart: new Date('2023-01-01T00:00:00Z'),
    qualityLevel: 3,
    values: { PP_10: 1002.5, TT_10: 4.1, TM5_10: 3.2, RF_10: 91, TD_10: 2.8 }
  });
  assert.deepEqual(records[1], {
    stationId: '00044',
    dateStart: new Date('2023-01-01T00:10:00Z'),
    qualityLevel: 3,
    values: { PP_10: null, TT_10: 4, TM5_10: 3.1, RF_10: 92, TD_10: 2.8 }
  });
});

test('parseMeasurementTable reads ten digit timestamps as the legacy form unless told otherwise', () => {
  const text = ['STATIONS_ID;MESS_DATUM;QN_9;TT_TU;eor', '1048;2023010215;1;-2.5;eor'].join('\n');

  assert.equal(parseMeasurementTable(text)[0]?.dateStart, null);
  assert.deepEqual(
    parseMeasurementTable(text, { timestampFormat: 'YYYYMMDDHH' })[0]?.dateStart,
    new Date('2023-01-02T15:00:00Z')
  );
});

test('parseMeasurementTable keeps unknown columns and numbered quality columns', () => {
  const text = ['STATIONS_ID;MESS_DATUM;QN_9;TT_TU;RF_TU;eor', '1048;2023010215;1;-2.5;88;eor'].join('\n');

  const records = parseMeasurementTable(text, { timestampFormat: 'YYYYMMDDHH' });

  assert.deepEqual(records, [
    {
      stationId: '01048',
      dateStart: new Date('2023-01-02T15:00:00Z'),
      qualityLevel: 1,
      values: { TT_TU: -2.5, RF_TU: 88 }
    }
  ]);
});

test('parseMeasurementTable keeps rows whose timestamp cannot be read', () => {
  const text = ['STATIONS_ID;MESS_DATUM;QN;TT_10;eor', '44;2023;3;1.0;eor'].join('\n');

  const [record] = parseMeasurementTable(text);

  assert.equal(record?.dateStart, null);
  assert.equal(record?.values.TT_10, 1);
});

test('parseMeasurementTable rejects a row with a missing cell', () => {
  const text = ['STATIONS_ID;MESS_DATUM;QN;TT_10;eor', '44;202301010000;3;eor'].join('\n');

  assert.throws(
    () => parseMeasurementTable(text, { source: 'produkt.txt' }),
    (error: unknown) =>
      error instanceof StructuralParseError &&
      error.source === 'produkt.txt' &&
      error.message === 'produkt.txt: line 2 has 4 fields, expected 5'
  );
});

test('parseMeasurementTable rejects non-numeric measurements', () => {
  const text = ['STATIONS_ID;MESS_DATUM;QN;TT_10;eor', '44;202301010000;3;warm;eor'].join('\n');

  assert.throws(
    () => parseMeasurementTable(text),
    (error: unknown) =>
      error instanceof StructuralParseError && error.stationId === '00044' && error.parameter === 'TT_10'
  );
});

test('parseMeasurementTable requires the identifying columns', () => {
  assert.throws(() => parseMeasurementTable('QN;TT_10;eor\n3;1.0;eor'), StructuralParseError);
  assert.throws(() => parseMeasurementTable(''), StructuralParseError);
});
