/**
 * MapsService Tests
 * Error taxonomy and orchestration, against the in-process fake provider
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { MapsService } from '../src/services/maps/maps.service.js';
import { MapsError, MAPS_ERROR_STATUS, isMapsError } from '../src/services/maps/maps.errors.js';
import { ProviderError } from '../src/services/google/google-maps.client.js';
import { FakeMapsProvider, place } from './fakes/fake-maps-provider.js';

function assertMapsError(kind: MapsError['kind'], message: string) {
  return (error: unknown): boolean => {
    assert.ok(isMapsError(error), 'expected a MapsError');
    assert.equal(error.kind, kind);
    assert.equal(error.message, message);
    return true;
  };
}

describe('MapsService', () => {
  let provider: FakeMapsProvider;
  let service: MapsService;

  beforeEach(() => {
    provider = new FakeMapsProvider();
    service = new MapsService(provider, { maxResults: 10 });
  });

  describe('error taxonomy', () => {
    it('should map each kind to its HTTP status', () => {
      assert.deepEqual(MAPS_ERROR_STATUS, {
        BAD_LOCATION: 400,
        NOT_FOUND: 404,
        NOT_CONFIGURED: 500,
        UPSTREAM_FAILURE: 500,
      });
      assert.equal(new MapsError('NOT_FOUND', 'No route found').statusCode, 404);
    });

    it('should keep the underlying failure as cause', () => {
      const cause = new ProviderError('OVER_QUERY_LIMIT', 'geocode');
      const error = new MapsError('UPSTREAM_FAILURE', 'Geocoding failed', cause);

      assert.equal(error.cause, cause);
      assert.equal(error.name, 'MapsError');
    });
  });

  describe('without a provider', () => {
    beforeEach(() => {
      service = new MapsService(null, { maxResults: 10 });
    });

    it('should report itself unconfigured', () => {
      assert.equal(service.isConfigured, false);
    });

    it('should reject every data operation with NOT_CONFIGURED', async () => {
      const notConfigured = assertMapsError('NOT_CONFIGURED', 'Maps API key not configured');

      await assert.rejects(service.searchPlaces({ query: 'ramen', radius: 5000 }), notConfigured);
      await assert.rejects(service.getPlaceDetails('place-1'), notConfigured);
      await assert.rejects(service.getDirections({ origin: 'A', destination: 'B', mode: 'driving' }), notConfigured);
      await assert.rejects(service.geocodeAddress({ address: 'Somewhere' }), notConfigured);
      await assert.rejects(service.fetchStaticMap({ q: 'x', width: 600, height: 400 }), notConfigured);
    });

    it('should refuse to build map URLs', () => {
      assert.throws(() => service.getEmbedSrc({ q: 'x', zoom: 14 }), assertMapsError('NOT_CONFIGURED', 'Maps API key not configured'));
      assert.throws(
        () => service.getStaticMapSrc({ q: 'x', width: 600, height: 400 }),
        assertMapsError('NOT_CONFIGURED', 'Maps API key not configured')
      );
    });
  });

  describe('searchPlaces', () => {
    it('should treat a geocoder failure on the location as a client error', async () => {
      provider.geocodeError = new ProviderError('REQUEST_DENIED', 'geocode');

      await assert.rejects(
        service.searchPlaces({ query: 'ramen', location: 'Gotham', radius: 5000 }),
        assertMapsError('BAD_LOCATION', 'Invalid location: Gotham')
      );
      assert.equal(provider.callsTo('nearbySearch').length, 0);
    });

    it('should use the first geocoded match that has coordinates', async () => {
      provider.geocodeResults = [
        { formatted_address: 'No geometry' },
        { geometry: { location: { lat: 51.5, lng: -0.12 } } },
      ];

      await service.searchPlaces({ query: 'tea', location: 'London', radius: 1000 });

      assert.deepEqual(provider.callsTo('nearbySearch')[0]?.args, [
        { location: { lat: 51.5, lng: -0.12 }, keyword: 'tea', radius: 1000 },
      ]);
    });

    it('should wrap provider search failures', async () => {
      provider.searchError = new Error('socket hang up');

      await assert.rejects(
        service.searchPlaces({ query: 'ramen', radius: 5000 }),
        assertMapsError('UPSTREAM_FAILURE', 'Search failed')
      );
    });

    it('should skip places without coordinates after truncating', async () => {
      service = new MapsService(provider, { maxResults: 2 });
      provider.searchResults = [
        place({ place_id: 'no-geo', geometry: undefined }),
        place({ place_id: 'a' }),
        place({ place_id: 'b' }),
      ];

      const response = await service.searchPlaces({ query: 'ramen', radius: 5000 });

      assert.equal(response.count, 1);
      assert.equal(response.results[0]?.place_id, 'a');
    });
  });

  describe('getPlaceDetails', () => {
    it('should fail upstream when the record has no coordinates', async () => {
      provider.placeDetail = { name: 'Ghost Kitchen' };

      await assert.rejects(
        service.getPlaceDetails('ghost'),
        assertMapsError('UPSTREAM_FAILURE', 'Failed to fetch place details')
      );
    });

    it('should wrap provider failures', async () => {
      provider.detailsError = new ProviderError('UNKNOWN_ERROR', 'place/details');

      await assert.rejects(
        service.getPlaceDetails('place-1'),
        assertMapsError('UPSTREAM_FAILURE', 'Failed to fetch place details')
      );
    });
  });

  describe('getDirections', () => {
    it('should return NOT_FOUND when the route has no legs', async () => {
      provider.routes = [{ summary: 'Nowhere', legs: [] }];

      await assert.rejects(
        service.getDirections({ origin: 'A', destination: 'B', mode: 'transit' }),
        assertMapsError('NOT_FOUND', 'No route found')
      );
    });

    it('should wrap provider failures', async () => {
      provider.directionsError = new ProviderError('OVER_QUERY_LIMIT', 'directions');

      await assert.rejects(
        service.getDirections({ origin: 'A', destination: 'B', mode: 'driving' }),
        assertMapsError('UPSTREAM_FAILURE', 'Failed to get directions')
      );
    });
  });

  describe('geocodeAddress', () => {
    it('should return NOT_FOUND when no match has coordinates', async () => {
      provider.geocodeResults = [{ formatted_address: 'Somewhere vague' }];

      await assert.rejects(
        service.geocodeAddress({ address: 'vague' }),
        assertMapsError('NOT_FOUND', 'Could not geocode address: vague')
      );
    });

    it('should wrap provider failures', async () => {
      provider.geocodeError = new ProviderError('HTTP_503', 'geocode');

      await assert.rejects(
        service.geocodeAddress({ address: 'Main St' }),
        assertMapsError('UPSTREAM_FAILURE', 'Geocoding failed')
      );
    });
  });

  describe('fetchStaticMap', () => {
    it('should reject a non-image payload', async () => {
      provider.image = { contentType: 'text/html', body: Buffer.from('<html></html>') };

      await assert.rejects(
        service.fetchStaticMap({ q: '40.7,-74.0', width: 600, height: 400 }),
        assertMapsError('UPSTREAM_FAILURE', 'Failed to fetch map image')
      );
    });
  });
});
