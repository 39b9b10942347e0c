import { describe, it, expect, beforeEach } from 'vitest';
import {
    BaseLocationAdapter,
    type MatrixRequest,
    type RouteRequest,
} from '@/services/location/adapters/base-location.adapter';
import {
    Address,
    AutocompleteResult,
    Coordinate,
    DistanceMatrixResult,
    GeocodingResult,
    RouteInfo,
} from '@/services/location/models';
import { APIError, RateLimitError, ValidationError } from '@/services/location/errors';
import {
    DistanceUnit,
    TravelMode,
    type CoordinateLike,
    type ProviderLimits,
} from '@/shared/types/common.types';

/**
 * Unit tests for the provider contract
 *
 * A fake adapter records every hook call so the tests can prove that
 * invalid input never reaches the vendor.
 */

class FakeAdapter extends BaseLocationAdapter {
    readonly name = 'fake';

    readonly limits: ProviderLimits = {
        maxMatrixSources: 2,
        maxMatrixTargets: 3,
        maxAutocompleteLimit: 10,
    };

    protected readonly travelModes = {
        [TravelMode.DRIVING]: 'car',
        [TravelMode.WALKING]: 'foot',
    };

    public calls: string[] = [];
    public geocodeResults: GeocodingResult[] = [];
    public autocompleteResults: AutocompleteResult[] = [];
    public failure: unknown = undefined;
    public lastMatrixRequest: MatrixRequest | undefined;
    public lastRouteRequest: RouteRequest | undefined;
    public matrixOverride: DistanceMatrixResult | undefined;
    public releaseCount = 0;

    protected async fetchGeocode(query: string): Promise<GeocodingResult[]> {
        this.record(`geocode:${query}`);
        return this.geocodeResults;
    }

    protected async fetchReverseGeocode(point: Coordinate): Promise<Address[]> {
        this.record(`reverseGeocode:${point.toString()}`);
        return [new Address({ city: 'Berlin' })];
    }

    protected async fetchAutocomplete(query: string, limit: number): Promise<AutocompleteResult[]> {
        this.record(`autocomplete:${query}:${limit}`);
        return this.autocompleteResults;
    }

    protected async fetchDistanceMatrix(request: MatrixRequest): Promise<DistanceMatrixResult> {
        this.record(`distanceMatrix:${request.modeToken}`);
        this.lastMatrixRequest = request;
        if (this.matrixOverride) {
            return this.matrixOverride;
        }
        const table = request.sources.map((_, i) => request.targets.map((_, j) => i * 10 + j));
        return new DistanceMatrixResult({
            distances: table,
            durations: table,
            sources: request.sources,
            targets: request.targets,
            mode: request.mode,
            units: request.units,
        });
    }

    protected async fetchRoute(request: RouteRequest): Promise<RouteInfo> {
        this.record(`route:${request.modeToken}`);
        this.lastRouteRequest = request;
        return new RouteInfo(1200, 90, request.mode);
    }

    protected async release(): Promise<void> {
        this.releaseCount += 1;
    }

    private record(call: string): void {
        this.calls.push(call);
        if (this.failure !== undefined) {
            throw this.failure;
        }
    }
}

/**
 * The routing operations as an untyped JavaScript caller sees them
 */
interface UntypedRouting {
    route(source: CoordinateLike, target: CoordinateLike, mode?: string): Promise<RouteInfo>;
    distanceMatrix(sources: CoordinateLike[], targets: CoordinateLike[], mode?: string): Promise<DistanceMatrixResult>;
}

function suggestion(rank: number): AutocompleteResult {
    return new AutocompleteResult({ address: new Address({ city: `City ${rank}` }), rank });
}

const berlin = new Coordinate(52.52, 13.405);
const hamburg = new Coordinate(53.5511, 9.9937);
const munich = new Coordinate(48.1351, 11.582);

describe('BaseLocationAdapter', () => {
    let adapter: FakeAdapter;

    beforeEach(() => {
        adapter = new FakeAdapter();
    });

    describe('geocode', () => {
        it('should forward the trimmed query and keep vendor order', async () => {
            adapter.geocodeResults = [
                new GeocodingResult({ coordinate: berlin, address: new Address({ city: 'Berlin' }), confidence: 0.4 }),
                new GeocodingResult({ coordinate: hamburg, address: new Address({ city: 'Hamburg' }), confidence: 0.9 }),
            ];

            const results = await adapter.geocode('  Berlin  ');

            expect(adapter.calls).toEqual(['geocode:Berlin']);
            expect(results.map((result) => result.address.city)).toEqual(['Berlin', 'Hamburg']);
        });

        it.each(['', '   ', '\t\n'])('should reject query %j without calling the vendor', async (query) => {
            await expect(adapter.geocode(query)).rejects.toBeInstanceOf(ValidationError);
            expect(adapter.calls).toEqual([]);
        });
    });

    describe('reverseGeocode', () => {
        it('should accept a plain lat/lon object', async () => {
            const addresses = await adapter.reverseGeocode({ latitude: 52.52, longitude: 13.405 });

            expect(adapter.calls).toEqual(['reverseGeocode:52.52,13.405']);
            expect(addresses[0]?.city).toBe('Berlin');
        });

        it('should reject an out-of-range point before any call', async () => {
            await expect(adapter.reverseGeocode({ latitude: 91, longitude: 0 })).rejects.toThrow(
                'Invalid point: point.latitude: Latitude must be between -90 and 90'
            );
            expect(adapter.calls).toEqual([]);
        });
    });

    describe('autocomplete', () => {
        it('should default the limit to 5', async () => {
            await adapter.autocomplete('Alex');

            expect(adapter.calls).toEqual(['autocomplete:Alex:5']);
        });

        it('should truncate to the limit even when the vendor returns more', async () => {
            adapter.autocompleteResults = [suggestion(1), suggestion(2), suggestion(3), suggestion(4)];

            const results = await adapter.autocomplete('Ci', 2);

            expect(results.map((result) => result.rank)).toEqual([1, 2]);
        });

        it.each(['', '  '])('should reject query %j without calling the vendor', async (query) => {
            await expect(adapter.autocomplete(query)).rejects.toBeInstanceOf(ValidationError);
            expect(adapter.calls).toEqual([]);
        });

        it.each([0, -1, 1.5, 11])('should reject limit %d', async (limit) => {
            await expect(adapter.autocomplete('Alex', limit)).rejects.toBeInstanceOf(ValidationError);
            expect(adapter.calls).toEqual([]);
        });
    });

    describe('distanceMatrix', () => {
        it('should return sources × targets tables for every size within the ceiling', async () => {
            const points = [berlin, hamburg, munich];
            for (let n = 1; n <= 2; n++) {
                for (let m = 1; m <= 3; m++) {
                    const matrix = await adapter.distanceMatrix(points.slice(0, n), points.slice(0, m));

                    expect(matrix.distances).toHaveLength(n);
                    expect(matrix.durations).toHaveLength(n);
                    for (let i = 0; i < n; i++) {
                        expect(matrix.distances[i]).toHaveLength(m);
                        expect(matrix.durations[i]).toHaveLength(m);
                    }
                }
            }
        });

        it('should pass the vendor mode token and default to driving in kilometers', async () => {
            const matrix = await adapter.distanceMatrix([berlin], [hamburg, munich]);

            expect(adapter.calls).toEqual(['distanceMatrix:car']);
            expect(adapter.lastMatrixRequest?.units).toBe(DistanceUnit.KILOMETERS);
            expect(matrix.mode).toBe(TravelMode.DRIVING);
            expect(matrix.distances).toEqual([[0, 1]]);
        });

        it('should re-validate plain coordinates', async () => {
            await adapter.distanceMatrix([{ latitude: 1, longitude: 2 }], [munich], TravelMode.WALKING);

            expect(adapter.lastMatrixRequest?.sources[0]).toBeInstanceOf(Coordinate);
            expect(adapter.lastMatrixRequest?.modeToken).toBe('foot');
        });

        it.each<[string, CoordinateLike[], CoordinateLike[]]>([
            ['empty sources', [], [berlin]],
            ['empty targets', [berlin], []],
            ['too many sources', [berlin, hamburg, munich], [berlin]],
            ['too many targets', [berlin], [berlin, hamburg, munich, berlin]],
            ['invalid target', [berlin], [{ latitude: 0, longitude: 500 }]],
        ])('should reject %s before any call', async (_, sources, targets) => {
            await expect(adapter.distanceMatrix(sources, targets)).rejects.toBeInstanceOf(ValidationError);
            expect(adapter.calls).toEqual([]);
        });

        it('should name the ceiling when a list is too long', async () => {
            await expect(adapter.distanceMatrix([berlin, hamburg, munich], [berlin])).rejects.toThrow(
                'fake supports at most 2 sources per request, received 3'
            );
        });

        it('should reject a mode the adapter does not map', async () => {
            await expect(adapter.distanceMatrix([berlin], [munich], TravelMode.CYCLING)).rejects.toThrow(
                'fake does not support travel mode "cycling"'
            );
            expect(adapter.calls).toEqual([]);
        });

        it('should raise APIError when the adapter returns the wrong shape', async () => {
            adapter.matrixOverride = new DistanceMatrixResult({
                distances: [[1]],
                durations: [[1]],
                sources: [berlin],
                targets: [munich],
                mode: TravelMode.DRIVING,
                units: DistanceUnit.METERS,
            });

            await expect(adapter.distanceMatrix([berlin, hamburg], [munich])).rejects.toThrow(
                'fake returned a 1×1 matrix for a 2×1 request'
            );
        });
    });

    describe('route', () => {
        it('should resolve the mode and return the adapter route', async () => {
            const route = await adapter.route(berlin, munich, TravelMode.WALKING);

            expect(adapter.calls).toEqual(['route:foot']);
            expect(route.mode).toBe(TravelMode.WALKING);
            expect(route.distanceKm).toBe(1.2);
        });

        it('should default to driving', async () => {
            await adapter.route(berlin, munich);

            expect(adapter.lastRouteRequest?.modeToken).toBe('car');
        });

        it('should reject unsupported modes and invalid points before any call', async () => {
            await expect(adapter.route(berlin, munich, TravelMode.TRUCK)).rejects.toBeInstanceOf(ValidationError);
            await expect(adapter.route(berlin, { latitude: -95, longitude: 0 })).rejects.toBeInstanceOf(ValidationError);
            expect(adapter.calls).toEqual([]);
        });
    });

    describe('travel mode validation', () => {
        it.each(['flying', 'toString', 'constructor', 'hasOwnProperty', ''])(
            'should reject mode %j on route and distanceMatrix before any call',
            async (mode) => {
                const untyped: UntypedRouting = adapter;

                await expect(untyped.route(berlin, munich, mode)).rejects.toThrow(
                    'Invalid mode: mode: Expected one of driving, walking, cycling, truck'
                );
                await expect(untyped.distanceMatrix([berlin], [munich], mode)).rejects.toBeInstanceOf(ValidationError);
                expect(adapter.calls).toEqual([]);
            }
        );
    });

    describe('error normalization', () => {
        it('should pass SDK errors through unchanged', async () => {
            const rateLimited = new RateLimitError('slow down', 10, 429);
            adapter.failure = rateLimited;

            await expect(adapter.geocode('Berlin')).rejects.toBe(rateLimited);
        });

        it('should wrap foreign errors as APIError with the original cause', async () => {
            const cause = new Error('socket hang up');
            adapter.failure = cause;

            const error = await adapter.route(berlin, munich).catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(APIError);
            if (error instanceof APIError) {
                expect(error.message).toBe('fake adapter failed: socket hang up');
                expect(error.cause).toBe(cause);
            }
        });
    });

    describe('lifecycle', () => {
        it('should list only the modes it maps', () => {
            expect(adapter.supportedModes).toEqual([TravelMode.DRIVING, TravelMode.WALKING]);
        });

        it('should release once and refuse calls after close', async () => {
            await adapter.close();
            await adapter.close();

            expect(adapter.isClosed).toBe(true);
            expect(adapter.releaseCount).toBe(1);
            await expect(adapter.geocode('Berlin')).rejects.toBeInstanceOf(APIError);
            expect(adapter.calls).toEqual([]);
        });
    });
});
