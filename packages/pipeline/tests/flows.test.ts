import assert from 'node:assert/strict';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';
import { ParquetReader } from 'parquetjs-lite';
import { createSilentLogger } from '@dwdbulk/shared';
import { buildPipelineConfig } from '../src/config';
import { ArgumentValidationError, ResourceFetchError } from '../src/errors';
import { createFlowContext, runForecastsFlow, runObservationsFlow, runStationsFlow, type FlowContext } from '../src/flows';
import { mosmixKml } from './fixtures';
import { ORIGIN, installMockServer, latin1, listingHtml, zipArchive, type MockServer } from './helpers';

const PARAMETER_PATH = '/climate_environment/CDC/observations_germany/climate/10_minutes/air_temperature/';
const MOSMIX_PATH = '/weather/local_forecasts/mos/MOSMIX_S/all_stations/kml/';
const DESCRIPTION = 'zehn_min_tu_Beschreibung_Stationen.txt';

const STATION_TABLE = [
  'Stations_id von_datum bis_datum Stationshoehe geoBreite geoLaenge Stationsname Bundesland',
  '----------- --------- --------- ------------- --------- --------- ----------------------------------------- ----------',
  '00044 20070209 20261018             44     52.9336    8.2370 Großenkneten                             Niedersachsen',
  '01048 19930101 20261018            228     51.1280   13.7543 Dresden-Klotzsche                        Sachsen'
].join('\n');

function measurementArchive(stationId: string, rows: string[]): Uint8Array {
  const header = 'STATIONS_ID;MESS_DATUM;  QN;PP_10;TT_10;TM5_10;RF_10;TD_10;eor';
  return zipArchive({
    [`Metadaten_Geographie_${stationId}.txt`]: 'Stations_id;Stationshoehe',
    [`produkt_zehn_min_tu_${stationId}.txt`]: [header, ...rows, ''].join('\n')
  });
}

async function readColumn(file: string, column: string): Promise<unknown[]> {
  const reader = await ParquetReader.openFile(file);
  try {
    const cursor = reader.getCursor([column]);
    const values: unknown[] = [];
    for (let row = await cursor.next(); row; row = await cursor.next()) {
      values.push(row[column]);
    }
    return values;
  } finally {
    await reader.close();
  }
}

describe('flows', () => {
  let server: MockServer;
  let dataDir: string;
  let context: FlowContext;

  beforeEach(async () => {
    server = installMockServer();
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'dwdbulk-flows-'));
    const config = buildPipelineConfig({ DWDBULK_BASE_URL: ORIGIN, DWDBULK_DATA_DIR: dataDir });
    context = createFlowContext(config, createSilentLogger());
  });

  afterEach(async () => {
    await server.restore();
    await rm(dataDir, { recursive: true, force: true });
  });

  function serveListings(): void {
    server.pool
      .intercept({ path: PARAMETER_PATH, method: 'GET' })
      .reply(200, listingHtml(PARAMETER_PATH, ['historical/', 'recent/']));
    server.pool
      .intercept({ path: `${PARAMETER_PATH}historical/`, method: 'GET' })
      .reply(
        200,
        listingHtml(`${PARAMETER_PATH}historical/`, [
          '10minutenwerte_TU_00044_20200101_20221231_hist.zip',
          '10minutenwerte_TU_01048_20200101_20221231_hist.zip',
          DESCRIPTION
        ])
      );
    server.pool
      .intercept({ path: `${PARAMETER_PATH}recent/`, method: 'GET' })
      .reply(200, listingHtml(`${PARAMETER_PATH}recent/`, ['10minutenwerte_TU_00044_akt.zip', DESCRIPTION]));
  }

  function serveDescriptions(): void {
    for (const bucket of ['historical', 'recent']) {
      server.pool
        .intercept({ path: `${PARAMETER_PATH}${bucket}/${DESCRIPTION}`, method: 'GET' })
        .reply(200, Buffer.from(latin1(STATION_TABLE)));
    }
  }

  it('writes deduplicated measurements for the requested station', async () => {
    serveListings();
    serveDescriptions();
    server.pool
      .intercept({ path: `${PARAMETER_PATH}historical/10minutenwerte_TU_00044_20200101_20221231_hist.zip`, method: 'GET' })
      .reply(
        200,
        Buffer.from(
          measurementArchive('00044', [
            '44;202212311230;1;1001.0;1.0;0.5;90.0;0.1;eor',
            '44;202212311240;1;1001.0;1.5;0.5;90.0;0.1;eor'
          ])
        )
      );
    server.pool
      .intercept({ path: `${PARAMETER_PATH}recent/10minutenwerte_TU_00044_akt.zip`, method: 'GET' })
      .reply(
        200,
        Buffer.from(
          measurementArchive('00044', [
            '44;202212311240;3;1001.0;2.0;0.5;90.0;0.1;eor',
            '44;202301010000;3;1001.0;3.0;0.5;90.0;0.1;eor'
          ])
        )
      );

    const result = await runObservationsFlow(context, {
      resolution: '10_minutes',
      parameter: 'air_temperature',
      stationIds: ['44']
    });

    assert.equal(result.archives, 2);
    assert.equal(result.rowCount, 3);
    assert.deepEqual(result.failed, []);
    assert.equal(result.files.length, 2);
    const [lastYear] = result.files;
    assert.ok(lastYear);
    assert.equal(
      path.relative(path.join(dataDir, '10_minutes', 'air_temperature'), path.dirname(lastYear)),
      path.join('date_start__year=2022', 'date_start__month=12', 'date_start__day=31')
    );
    assert.deepEqual(await readColumn(lastYear, 'TT_10'), [1, 2]);
  });

  it('lists failed archives and keeps going', async () => {
    serveListings();
    server.pool
      .intercept({ path: `${PARAMETER_PATH}historical/10minutenwerte_TU_00044_20200101_20221231_hist.zip`, method: 'GET' })
      .reply(404, 'not found');
    server.pool
      .intercept({ path: `${PARAMETER_PATH}historical/10minutenwerte_TU_01048_20200101_20221231_hist.zip`, method: 'GET' })
      .reply(200, Buffer.from(measurementArchive('01048', ['1048;202212311230;1;1001.0;1.0;0.5;90.0;0.1;eor'])));
    server.pool
      .intercept({ path: `${PARAMETER_PATH}recent/10minutenwerte_TU_00044_akt.zip`, method: 'GET' })
      .reply(200, Buffer.from(measurementArchive('00044', ['44;202301010000;3;-999;-999;-999;-999;-999;eor'])));

    const result = await runObservationsFlow(context, { resolution: '10_minutes', parameter: 'air_temperature' });

    assert.equal(result.archives, 3);
    assert.deepEqual(result.failed, [
      {
        uri: `${ORIGIN}${PARAMETER_PATH}historical/10minutenwerte_TU_00044_20200101_20221231_hist.zip`,
        message: `Fetching resource ${ORIGIN}${PARAMETER_PATH}historical/10minutenwerte_TU_00044_20200101_20221231_hist.zip failed with status 404`
      }
    ]);
    assert.equal(result.rowCount, 2);
  });

  it('stops at the first failure with failFast', async () => {
    serveListings();
    server.pool
      .intercept({ path: `${PARAMETER_PATH}historical/10minutenwerte_TU_00044_20200101_20221231_hist.zip`, method: 'GET' })
      .reply(500, 'boom');

    await assert.rejects(
      runObservationsFlow(context, { resolution: '10_minutes', parameter: 'air_temperature', failFast: true }),
      (error: unknown) => error instanceof ResourceFetchError && error.status === 500
    );
  });

  it('writes each station before fetching the next', async () => {
    serveListings();
    server.pool
      .intercept({ path: `${PARAMETER_PATH}historical/10minutenwerte_TU_00044_20200101_20221231_hist.zip`, method: 'GET' })
      .reply(200, Buffer.from(measurementArchive('00044', ['44;202212311230;1;1001.0;1.0;0.5;90.0;0.1;eor'])));
    server.pool
      .intercept({ path: `${PARAMETER_PATH}recent/10minutenwerte_TU_00044_akt.zip`, method: 'GET' })
      .reply(200, Buffer.from(measurementArchive('00044', ['44;202212311240;3;1001.0;2.0;0.5;90.0;0.1;eor'])));
    server.pool
      .intercept({ path: `${PARAMETER_PATH}historical/10minutenwerte_TU_01048_20200101_20221231_hist.zip`, method: 'GET' })
      .reply(500, 'boom');

    await assert.rejects(
      runObservationsFlow(context, { resolution: '10_minutes', parameter: 'air_temperature', failFast: true }),
      ResourceFetchError
    );

    const directory = path.join(dataDir, '10_minutes', 'air_temperature');
    const written = (await readdir(directory, { recursive: true })).filter((entry) => entry.endsWith('.parquet'));
    assert.equal(written.length, 1);
    const [file] = written;
    assert.ok(file);
    assert.deepEqual(await readColumn(path.join(directory, file), 'TT_10'), [1, 2]);
  });

  it('rejects stations missing from the station list', async () => {
    serveListings();
    serveDescriptions();

    await assert.rejects(
      runObservationsFlow(context, { resolution: '10_minutes', parameter: 'air_temperature', stationIds: ['3'] }),
      (error: unknown) => error instanceof ArgumentValidationError && error.issues[0] === 'Unknown station 00003'
    );
  });

  it('writes the deduplicated station list', async () => {
    serveListings();
    serveDescriptions();

    const result = await runStationsFlow(context, { resolution: '10_minutes', parameter: 'air_temperature' });

    assert.deepEqual(
      result.stations.map((station) => station.stationId),
      ['00044', '01048']
    );
    assert.equal(result.files.length, 1);
    const [file] = result.files;
    assert.ok(file);
    assert.equal(path.dirname(file), path.join(dataDir, 'stations', 'air_temperature'));
    assert.deepEqual(await readColumn(file, 'name'), ['Großenkneten', 'Dresden-Klotzsche']);
  });

  it('writes forecasts for the lookup stations, skipping the LATEST alias', async () => {
    server.pool
      .intercept({ path: MOSMIX_PATH, method: 'GET' })
      .reply(200, listingHtml(MOSMIX_PATH, ['MOSMIX_S_2026101909_240.kmz', 'MOSMIX_S_LATEST_240.kmz']));
    server.pool
      .intercept({ path: `${MOSMIX_PATH}MOSMIX_S_2026101909_240.kmz`, method: 'GET' })
      .reply(200, Buffer.from(zipArchive({ 'MOSMIX_S_2026101909_240.kml': mosmixKml() })));

    const result = await runForecastsFlow(context);

    assert.equal(result.documents, 1);
    assert.equal(result.rowCount, 3);
    assert.equal(result.stationCount, 2);
    assert.deepEqual(result.failed, []);
    assert.deepEqual(
      result.files.map((file) => path.relative(dataDir, path.dirname(file))),
      [
        path.join('forecasts', 'date_start__year=2026', 'date_start__month=10', 'date_start__day=19'),
        'forecast_stations'
      ]
    );
  });

  it('writes every forecast document as soon as it is parsed', async () => {
    server.pool
      .intercept({ path: MOSMIX_PATH, method: 'GET' })
      .reply(200, listingHtml(MOSMIX_PATH, ['MOSMIX_S_2026101909_240.kmz', 'MOSMIX_S_2026101910_240.kmz']));
    for (const run of ['2026101909', '2026101910']) {
      server.pool
        .intercept({ path: `${MOSMIX_PATH}MOSMIX_S_${run}_240.kmz`, method: 'GET' })
        .reply(200, Buffer.from(zipArchive({ [`MOSMIX_S_${run}_240.kml`]: mosmixKml() })));
    }

    const result = await runForecastsFlow(context, { includeStations: false });

    assert.equal(result.documents, 2);
    assert.equal(result.rowCount, 6);
    assert.equal(result.files.length, 2);
    for (const file of result.files) {
      assert.deepEqual(await readColumn(file, 'station_id'), ['10381', '10381', '10381']);
    }
  });

  it('keeps every station with allStations', async () => {
    server.pool
      .intercept({ path: MOSMIX_PATH, method: 'GET' })
      .reply(200, listingHtml(MOSMIX_PATH, ['MOSMIX_S_2026101909_240.kmz']));
    server.pool
      .intercept({ path: `${MOSMIX_PATH}MOSMIX_S_2026101909_240.kmz`, method: 'GET' })
      .reply(200, Buffer.from(zipArchive({ 'MOSMIX_S_2026101909_240.kml': mosmixKml() })));

    const result = await runForecastsFlow(context, { allStations: true, parameters: ['TTT'], includeStations: false });

    assert.equal(result.rowCount, 6);
    assert.equal(result.stationCount, 0);
    assert.equal(result.files.length, 1);
  });
});
