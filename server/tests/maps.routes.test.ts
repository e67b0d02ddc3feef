/**
 * Maps Gateway HTTP tests
 * Full Express app against an in-process fake provider (no network).
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';
import { createApp } from '../src/app.js';
import { MapsService } from '../src/services/maps/maps.service.js';
import { ProviderError } from '../src/services/google/google-maps.client.js';
import { FakeMapsProvider, place } from './fakes/fake-maps-provider.js';

const config = { appName: 'Test Gateway', corsOrigins: ['http://localhost:3000'] };

function appWith(provider: FakeMapsProvider | null, maxResults = 10) {
  return createApp({ service: new MapsService(provider, { maxResults }), config });
}

describe('Maps Gateway routes', () => {
  let provider: FakeMapsProvider;

  beforeEach(() => {
    provider = new FakeMapsProvider();
  });

  describe('POST /api/maps/geocode', () => {
    it('should reshape a single provider match', async () => {
      provider.geocodeResults = [{
        formatted_address: 'Manhattan, NY 10036, USA',
        geometry: { location: { lat: 40.758, lng: -73.985 }, location_type: 'APPROXIMATE' },
        place_id: 'abc123',
        types: ['neighborhood'],
      }];

      const response = await request(appWith(provider))
        .post('/api/maps/geocode')
        .send({ address: 'Times Square, New York' });

      assert.equal(response.status, 200);
      assert.deepEqual(response.body, {
        address: 'Times Square, New York',
        results: [{
          formatted_address: 'Manhattan, NY 10036, USA',
          location: { lat: 40.758, lng: -73.985 },
          location_type: 'APPROXIMATE',
          place_id: 'abc123',
        }],
        count: 1,
      });
      assert.deepEqual(provider.callsTo('geocode')[0]?.args, ['Times Square, New York']);
    });

    it('should cap results at 5', async () => {
      provider.geocodeResults = Array.from({ length: 7 }, (_, i) => ({
        formatted_address: `Springfield ${i}`,
        geometry: { location: { lat: i, lng: -i }, location_type: 'APPROXIMATE' },
        place_id: `sp-${i}`,
      }));

      const response = await request(appWith(provider))
        .post('/api/maps/geocode')
        .send({ address: 'Springfield' });

      assert.equal(response.status, 200);
      assert.equal(response.body.count, 5);
      assert.equal(response.body.results.length, 5);
      assert.equal(response.body.results[4].place_id, 'sp-4');
    });

    it('should return 404 when nothing matches', async () => {
      const response = await request(appWith(provider))
        .post('/api/maps/geocode')
        .send({ address: 'Nowhere Land' });

      assert.equal(response.status, 404);
      assert.equal(response.body.code, 'NOT_FOUND');
      assert.equal(response.body.error, 'Could not geocode address: Nowhere Land');
    });

    it('should reject a missing address', async () => {
      const response = await request(appWith(provider))
        .post('/api/maps/geocode')
        .send({});

      assert.equal(response.status, 400);
      assert.equal(response.body.code, 'VALIDATION_ERROR');
      assert.equal(response.body.error, 'address: Address is required');
      assert.equal(provider.calls.length, 0);
    });
  });

  describe('POST /api/maps/search', () => {
    it('should reject a whitespace-only query before calling the provider', async () => {
      const response = await request(appWith(provider))
        .post('/api/maps/search')
        .send({ query: '   ', location: 'Brooklyn' });

      assert.equal(response.status, 400);
      assert.equal(response.body.code, 'VALIDATION_ERROR');
      assert.equal(response.body.error, 'query: Query cannot be empty or whitespace');
      assert.deepEqual(response.body.details, [
        { field: 'query', message: 'Query cannot be empty or whitespace' },
      ]);
      assert.equal(provider.calls.length, 0);
    });

    it('should reject a radius outside 1-50000', async () => {
      const response = await request(appWith(provider))
        .post('/api/maps/search')
        .send({ query: 'ramen', radius: 50001 });

      assert.equal(response.status, 400);
      assert.equal(response.body.details[0].field, 'radius');
      assert.equal(provider.calls.length, 0);
    });

    it('should return an empty list, not an error, when nothing is found', async () => {
      const response = await request(appWith(provider))
        .post('/api/maps/search')
        .send({ query: 'unicorn stables' });

      assert.equal(response.status, 200);
      assert.deepEqual(response.body, { query: 'unicorn stables', results: [], count: 0 });
      assert.equal(provider.callsTo('textSearch').length, 1);
    });

    it('should trim the query and run a text search without a location', async () => {
      provider.searchResults = [place()];

      const response = await request(appWith(provider))
        .post('/api/maps/search')
        .send({ query: '  ramen  ' });

      assert.equal(response.status, 200);
      assert.deepEqual(response.body, {
        query: 'ramen',
        results: [{
          name: 'Test Ramen',
          address: '1 Main St',
          place_id: 'place-1',
          rating: 4.5,
          user_ratings_total: 120,
          location: { lat: 40.7, lng: -74.0 },
          types: ['restaurant', 'food'],
          google_maps_url: 'https://www.google.com/maps/place/?q=place_id:place-1',
        }],
        count: 1,
      });
      assert.deepEqual(provider.callsTo('textSearch')[0]?.args, ['ramen']);
    });

    it('should geocode the location then search nearby', async () => {
      provider.geocodeResults = [{ geometry: { location: { lat: 40.6782, lng: -73.9442 } } }];
      provider.searchResults = [place()];

      const response = await request(appWith(provider))
        .post('/api/maps/search')
        .send({ query: 'ramen', location: 'Brooklyn, NY', radius: 2000 });

      assert.equal(response.status, 200);
      assert.deepEqual(provider.calls.map((c) => c.method), ['geocode', 'nearbySearch']);
      assert.deepEqual(provider.callsTo('nearbySearch')[0]?.args, [{
        location: { lat: 40.6782, lng: -73.9442 },
        keyword: 'ramen',
        radius: 2000,
      }]);
    });

    it('should fail with 400 naming an unresolvable location', async () => {
      const response = await request(appWith(provider))
        .post('/api/maps/search')
        .send({ query: 'ramen', location: 'Atlantis' });

      assert.equal(response.status, 400);
      assert.equal(response.body.code, 'BAD_LOCATION');
      assert.equal(response.body.error, 'Could not find location: Atlantis');
      assert.equal(provider.callsTo('nearbySearch').length, 0);
      assert.equal(provider.callsTo('textSearch').length, 0);
    });

    it('should truncate to the configured maximum', async () => {
      provider.searchResults = [
        place({ place_id: 'a' }),
        place({ place_id: 'b' }),
        place({ place_id: 'c' }),
      ];

      const response = await request(appWith(provider, 2))
        .post('/api/maps/search')
        .send({ query: 'ramen' });

      assert.equal(response.status, 200);
      assert.equal(response.body.count, 2);
      assert.deepEqual(response.body.results.map((r: { place_id: string }) => r.place_id), ['a', 'b']);
    });

    it('should hide provider failure details behind a generic message', async () => {
      provider.searchError = new ProviderError('REQUEST_DENIED', 'place/textsearch', 'The provided API key is invalid.');

      const response = await request(appWith(provider))
        .post('/api/maps/search')
        .send({ query: 'ramen' });

      assert.equal(response.status, 500);
      assert.equal(response.body.error, 'Search failed');
      assert.equal(response.body.code, 'UPSTREAM_FAILURE');
      assert.deepEqual(Object.keys(response.body).sort(), ['code', 'error', 'traceId']);
    });

    it('should echo a safe client trace id', async () => {
      const response = await request(appWith(provider))
        .post('/api/maps/search')
        .set('x-trace-id', 'trace-abc_123')
        .send({ query: 'ramen' });

      assert.equal(response.headers['x-trace-id'], 'trace-abc_123');
    });

    it('should reject malformed JSON with 400', async () => {
      const response = await request(appWith(provider))
        .post('/api/maps/search')
        .set('Content-Type', 'application/json')
        .send('{"query": ');

      assert.equal(response.status, 400);
      assert.equal(response.body.code, 'VALIDATION_ERROR');
      assert.equal(response.body.error, 'Malformed JSON body');
    });
  });

  describe('GET /api/maps/place/:placeId', () => {
    it('should return 404, not 500, for an unknown id', async () => {
      const response = await request(appWith(provider)).get('/api/maps/place/missing-id');

      assert.equal(response.status, 404);
      assert.equal(response.body.code, 'NOT_FOUND');
      assert.equal(response.body.error, 'Place not found: missing-id');
    });

    it('should reduce opening hours and request the fixed field set', async () => {
      provider.placeDetail = {
        name: 'Test Ramen',
        formatted_address: '1 Main St, New York, NY',
        formatted_phone_number: '(212) 555-0100',
        website: 'https://ramen.example.com',
        rating: 4.4,
        price_level: 2,
        opening_hours: {
          open_now: true,
          weekday_text: ['Monday: 11:00 AM – 10:00 PM'],
        },
        geometry: { location: { lat: 40.7, lng: -74.0 } },
      };

      const response = await request(appWith(provider)).get('/api/maps/place/place-1');

      assert.equal(response.status, 200);
      assert.deepEqual(response.body, {
        name: 'Test Ramen',
        formatted_address: '1 Main St, New York, NY',
        formatted_phone_number: '(212) 555-0100',
        website: 'https://ramen.example.com',
        rating: 4.4,
        price_level: 2,
        opening_hours: { open_now: true, weekday_text: ['Monday: 11:00 AM – 10:00 PM'] },
        location: { lat: 40.7, lng: -74.0 },
        google_maps_url: 'https://www.google.com/maps/place/?q=place_id:place-1',
      });
      const [placeId, fields] = provider.callsTo('placeDetails')[0]?.args ?? [];
      assert.equal(placeId, 'place-1');
      assert.deepEqual(fields, [
        'name', 'formatted_address', 'formatted_phone_number', 'international_phone_number',
        'website', 'rating', 'user_ratings_total', 'price_level', 'opening_hours', 'geometry', 'types',
      ]);
    });
  });

  describe('POST /api/maps/directions', () => {
    beforeEach(() => {
      provider.routes = [{
        summary: 'Broadway',
        legs: [{
          distance: { text: '2.1 km' },
          duration: { text: '27 mins' },
          start_address: 'A St',
          end_address: 'B Ave',
          start_location: { lat: 40.75, lng: -73.99 },
          end_location: { lat: 40.77, lng: -73.97 },
          steps: [
            { html_instructions: 'Head <b>north</b>', distance: { text: '0.2 km' }, duration: { text: '3 mins' } },
          ],
        }],
      }];
    });

    it('should accept the travel mode in any case and normalize it', async () => {
      const response = await request(appWith(provider))
        .post('/api/maps/directions')
        .send({ origin: 'A St', destination: 'B Ave', mode: 'WALKING' });

      assert.equal(response.status, 200);
      assert.equal(response.body.mode, 'walking');
      assert.deepEqual(provider.callsTo('directions')[0]?.args, [
        { origin: 'A St', destination: 'B Ave', mode: 'walking' },
      ]);
      assert.equal(
        response.body.google_maps_url,
        'https://www.google.com/maps/dir/?api=1&origin=A St&destination=B Ave&travelmode=walking'
      );
      assert.deepEqual(response.body.route, {
        summary: 'Broadway',
        distance: '2.1 km',
        duration: '27 mins',
        start_address: 'A St',
        end_address: 'B Ave',
        start_location: { lat: 40.75, lng: -73.99 },
        end_location: { lat: 40.77, lng: -73.97 },
        steps: [{ instruction: 'Head <b>north</b>', distance: '0.2 km', duration: '3 mins' }],
      });
    });

    it('should default the mode to driving', async () => {
      const response = await request(appWith(provider))
        .post('/api/maps/directions')
        .send({ origin: 'A St', destination: 'B Ave' });

      assert.equal(response.status, 200);
      assert.equal(response.body.mode, 'driving');
    });

    it('should reject an unknown mode listing the allowed set', async () => {
      const response = await request(appWith(provider))
        .post('/api/maps/directions')
        .send({ origin: 'A St', destination: 'B Ave', mode: 'flying' });

      assert.equal(response.status, 400);
      assert.equal(response.body.error, 'mode: Mode must be one of: driving, walking, bicycling, transit');
      assert.equal(provider.calls.length, 0);
    });

    it('should return 404 when there is no route', async () => {
      provider.routes = [];

      const response = await request(appWith(provider))
        .post('/api/maps/directions')
        .send({ origin: 'Honolulu', destination: 'Tokyo', mode: 'driving' });

      assert.equal(response.status, 404);
      assert.equal(response.body.error, 'No route found');
    });
  });

  describe('Static and embed maps', () => {
    afterEach(() => {
      mock.restoreAll();
    });

    it('should report misconfiguration without attempting an upstream fetch', async () => {
      const fetchMock = mock.method(globalThis, 'fetch', async () => new Response(null, { status: 200 }));

      const response = await request(appWith(null))
        .get('/api/maps/static-image')
        .query({ q: '40.7,-74.0' });

      assert.equal(response.status, 500);
      assert.equal(response.body.code, 'NOT_CONFIGURED');
      assert.equal(response.body.error, 'Maps API key not configured');
      assert.equal(fetchMock.mock.callCount(), 0);
    });

    it('should proxy image bytes with a one-hour cache header', async () => {
      const response = await request(appWith(provider))
        .get('/api/maps/static-image')
        .query({ q: '40.7,-74.0', width: 400, height: 300 });

      assert.equal(response.status, 200);
      assert.equal(response.headers['content-type'], 'image/png');
      assert.equal(response.headers['cache-control'], 'public, max-age=3600');
      assert.deepEqual(Buffer.from(response.body), Buffer.from([0x89, 0x50, 0x4e, 0x47]));
      assert.deepEqual(provider.callsTo('fetchStaticMap')[0]?.args, [{
        q: '40.7,-74.0',
        width: 400,
        height: 300,
      }]);
    });

    it('should return 500 when the upstream image fetch fails', async () => {
      provider.imageError = new ProviderError('HTTP_403', 'staticmap');

      const response = await request(appWith(provider))
        .get('/api/maps/static-image')
        .query({ q: '40.7,-74.0' });

      assert.equal(response.status, 500);
      assert.equal(response.body.code, 'UPSTREAM_FAILURE');
      assert.equal(response.body.error, 'Failed to fetch map image');
    });

    it('should build the embed URL server-side', async () => {
      const response = await request(appWith(provider))
        .get('/api/maps/embed')
        .query({ q: 'Central Park' });

      assert.equal(response.status, 200);
      assert.deepEqual(response.body, {
        src: 'https://www.google.com/maps/embed/v1/search?key=test-key&q=Central+Park&zoom=14',
      });
    });

    it('should redirect to the embed URL', async () => {
      const response = await request(appWith(provider))
        .get('/api/maps/embed-redirect')
        .query({ q: 'Central Park', zoom: 12 });

      assert.equal(response.status, 302);
      assert.equal(
        response.headers.location,
        'https://www.google.com/maps/embed/v1/search?key=test-key&q=Central+Park&zoom=12'
      );
    });

    it('should expand joined marker specs into repeated parameters', async () => {
      const response = await request(appWith(provider))
        .get('/api/maps/static')
        .query({
          q: '40.7,-74.0',
          markers: 'markers=color:red|label:1|40.7,-74&markers=color:red|label:2|40.8,-73.9',
        });

      assert.equal(response.status, 200);
      assert.equal(
        response.body.src,
        'https://maps.googleapis.com/maps/api/staticmap?center=40.7%2C-74.0&size=600x400' +
          '&markers=color%3Ared%7Clabel%3A1%7C40.7%2C-74' +
          '&markers=color%3Ared%7Clabel%3A2%7C40.8%2C-73.9' +
          '&key=test-key'
      );
    });

    it('should reject an embed request without q', async () => {
      const response = await request(appWith(provider)).get('/api/maps/embed');

      assert.equal(response.status, 400);
      assert.equal(response.body.error, 'q: q is required');
    });
  });

  describe('Service endpoints', () => {
    it('GET /health should report key configuration', async () => {
      const configured = await request(appWith(provider)).get('/health');
      const missing = await request(appWith(null)).get('/health');

      assert.deepEqual(configured.body, {
        status: 'healthy',
        service: 'maps-gateway',
        version: '1.0.0',
        maps_api_configured: true,
      });
      assert.equal(missing.status, 200);
      assert.equal(missing.body.maps_api_configured, false);
    });

    it('should answer unknown routes with the error shape', async () => {
      const response = await request(appWith(provider)).get('/api/maps/unknown');

      assert.equal(response.status, 404);
      assert.equal(response.body.code, 'NOT_FOUND');
      assert.equal(response.body.error, 'Route not found: GET /api/maps/unknown');
    });
  });
});
