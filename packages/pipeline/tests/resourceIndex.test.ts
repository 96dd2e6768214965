import assert from 'node:assert/strict';
import { after, before, test } from 'node:test';
import { OpenDataClient } from '../src/client';
import { ResourceFetchError } from '../src/errors';
import { parseResourceListing } from '../src/resourceIndex';
import { CLIMATE_ROOT, installMockServer, listingHtml, type MockServer } from './helpers';

const LISTING = listingHtml('/climate/10_minutes/', ['air_temperature/', 'precipitation/', 'BESCHREIBUNG.pdf']);

test('parseResourceListing joins links onto the listing url and drops the parent link', () => {
  const links = parseResourceListing(LISTING, 'http://opendata.test/climate/10_minutes');
  assert.deepEqual(links, [
    'http://opendata.test/climate/10_minutes/air_temperature/',
    'http://opendata.test/climate/10_minutes/precipitation/',
    'http://opendata.test/climate/10_minutes/BESCHREIBUNG.pdf'
  ]);
});

test('parseResourceListing filters by substring and strips trailing slashes for bare names', () => {
  const links = parseResourceListing(LISTING, 'http://opendata.test/climate/10_minutes/', {
    extensionFilter: '/',
    absolute: false
  });
  assert.deepEqual(links, ['air_temperature', 'precipitation']);
});

test('parseResourceListing returns nothing for a page without anchors', () => {
  assert.deepEqual(parseResourceListing('<html><body>empty</body></html>', CLIMATE_ROOT), []);
});

let server: MockServer;

before(() => {
  server = installMockServer();
});

after(async () => {
  await server.restore();
});

test('resolveIndex fetches and parses a listing', async () => {
  server.pool.intercept({ path: '/climate/', method: 'GET' }).reply(200, listingHtml('/climate/', ['hourly/', 'daily/']));
  const client = new OpenDataClient();
  const links = await client.resolveIndex(CLIMATE_ROOT);
  assert.deepEqual(links, ['http://opendata.test/climate/hourly/', 'http://opendata.test/climate/daily/']);
});

test('resolveIndex raises ResourceFetchError on a non-2xx answer', async () => {
  server.pool.intercept({ path: '/climate/missing/', method: 'GET' }).reply(404, 'not found');
  const client = new OpenDataClient();
  await assert.rejects(client.resolveIndex(`${CLIMATE_ROOT}missing/`), (error: unknown) => {
    assert.ok(error instanceof ResourceFetchError);
    assert.equal(error.status, 404);
    assert.equal(error.uri, 'http://opendata.test/climate/missing/');
    return true;
  });
});

test('resolveIndex raises ResourceFetchError with a null status on transport failure', async () => {
  server.pool.intercept({ path: '/climate/broken/', method: 'GET' }).replyWithError(new Error('socket hang up'));
  const client = new OpenDataClient();
  await assert.rejects(client.resolveIndex(`${CLIMATE_ROOT}broken/`), (error: unknown) => {
    assert.ok(error instanceof ResourceFetchError);
    assert.equal(error.status, null);
    return true;
  });
});
