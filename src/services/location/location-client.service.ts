import { DistanceUnit, TravelMode, type CoordinateLike } from '@/shared/types/common.types';
import type { LocationProvider } from './adapters/location-provider.interface';
import type {
    Address,
    AutocompleteResult,
    DistanceMatrixResult,
    GeocodingResult,
    RouteInfo,
} from './models';

/**
 * Location Client
 *
 * The object applications hold. Wraps exactly one provider, forwards every
 * call to it unchanged and owns its lifecycle.
 *
 * A client is as safe for concurrent calls as its provider's transport;
 * closing it aborts requests still in flight.
 *
 * @example
 * const client = new LocationClient(new GeoapifyAdapter({ apiKey }));
 * await client.use(async (c) => {
 *     const [top] = await c.geocode('Paris, France');
 * });
 */
export class LocationClient {
    constructor(private readonly locationProvider: LocationProvider) {}

    /** The provider every call is forwarded to */
    get provider(): LocationProvider {
        return this.locationProvider;
    }

    get isClosed(): boolean {
        return this.locationProvider.isClosed;
    }

    geocode(query: string): Promise<GeocodingResult[]> {
        return this.locationProvider.geocode(query);
    }

    reverseGeocode(point: CoordinateLike): Promise<Address[]> {
        return this.locationProvider.reverseGeocode(point);
    }

    autocomplete(query: string, limit?: number): Promise<AutocompleteResult[]> {
        return this.locationProvider.autocomplete(query, limit);
    }

    distanceMatrix(
        sources: CoordinateLike[],
        targets: CoordinateLike[],
        mode: TravelMode = TravelMode.DRIVING,
        units: DistanceUnit = DistanceUnit.KILOMETERS
    ): Promise<DistanceMatrixResult> {
        return this.locationProvider.distanceMatrix(sources, targets, mode, units);
    }

    route(source: CoordinateLike, target: CoordinateLike, mode: TravelMode = TravelMode.DRIVING): Promise<RouteInfo> {
        return this.locationProvider.route(source, target, mode);
    }

    /**
     * Release the provider's transport. Safe to call more than once.
     */
    async close(): Promise<void> {
        await this.locationProvider.close();
    }

    /**
     * Run `fn` with this client and close it afterwards,
     * whether `fn` resolves or throws
     *
     * @returns Whatever `fn` resolves to
     */
    async use<T>(fn: (client: LocationClient) => Promise<T>): Promise<T> {
        try {
            return await fn(this);
        } finally {
            await this.close();
        }
    }
}

/**
 * Create a client around `provider`, run `fn`, then close it
 *
 * @example
 * const routes = await withLocationClient(provider, (client) =>
 *     client.route(origin, destination, TravelMode.WALKING)
 * );
 */
export async function withLocationClient<T>(
    provider: LocationProvider,
    fn: (client: LocationClient) => Promise<T>
): Promise<T> {
    return new LocationClient(provider).use(fn);
}
