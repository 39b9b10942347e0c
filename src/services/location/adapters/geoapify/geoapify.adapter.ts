import { TravelMode, type ProviderLimits } from '@/shared/types/common.types';
import { createContextLogger } from '@/shared/utils/logger';
import { parseOrThrow, providerOptionsSchema } from '@/shared/utils/validators';
import { HttpTransport, type FetchLike } from '../../transport/http.transport';
import type {
    Address,
    AutocompleteResult,
    Coordinate,
    DistanceMatrixResult,
    GeocodingResult,
    RouteInfo,
} from '../../models';
import {
    BaseLocationAdapter,
    type BaseAdapterOptions,
    type MatrixRequest,
    type RouteRequest,
} from '../base-location.adapter';
import {
    toAddresses,
    toAutocompleteResults,
    toDistanceMatrix,
    toGeocodingResults,
    toRouteInfo,
} from './geoapify.transformer';
import type { GeoapifyMatrixRequestBody } from './geoapify.types';

export const GEOAPIFY_BASE_URL = 'https://api.geoapify.com/v1';
export const GEOAPIFY_DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Geoapify adapter configuration
 */
export interface GeoapifyAdapterOptions extends BaseAdapterOptions {
    /** Geoapify API key (required) */
    apiKey: string;
    /** Endpoint override, e.g. a mock server (default: public API) */
    baseUrl?: string | undefined;
    /** Per-request timeout in milliseconds (default: 10000) */
    timeoutMs?: number | undefined;
    /** Custom fetch implementation */
    fetch?: FetchLike | undefined;
}

/**
 * Geoapify Adapter
 *
 * Integrates with the Geoapify geocoding, autocomplete, route matrix and
 * routing APIs. The API key travels as the `apiKey` query parameter.
 * API Docs: https://apidocs.geoapify.com/
 */
export class GeoapifyAdapter extends BaseLocationAdapter {
    readonly name = 'geoapify';

    readonly limits: ProviderLimits = {
        maxMatrixSources: 10,
        maxMatrixTargets: 10,
        maxAutocompleteLimit: 50,
    };

    protected readonly travelModes = {
        [TravelMode.DRIVING]: 'drive',
        [TravelMode.WALKING]: 'walk',
        [TravelMode.CYCLING]: 'bicycle',
        [TravelMode.TRUCK]: 'truck',
    } as const;

    private readonly transport: HttpTransport;

    /**
     * @throws {ValidationError} If the API key is missing or an option is invalid
     */
    constructor(options: GeoapifyAdapterOptions) {
        super(options);

        const config = parseOrThrow(providerOptionsSchema, {
            apiKey: options.apiKey,
            baseUrl: options.baseUrl ?? GEOAPIFY_BASE_URL,
            timeoutMs: options.timeoutMs ?? GEOAPIFY_DEFAULT_TIMEOUT_MS,
        }, 'geoapify options');

        this.transport = new HttpTransport({
            vendor: 'Geoapify',
            baseUrl: config.baseUrl,
            timeoutMs: config.timeoutMs,
            logger: createContextLogger(this.logger, { provider: this.name }),
            defaultSearchParams: { apiKey: config.apiKey },
            fetch: options.fetch,
        });
    }

    protected async fetchGeocode(query: string): Promise<GeocodingResult[]> {
        const body = await this.transport.getJson('geocode/search', {
            text: query,
            format: 'json',
        });
        return toGeocodingResults(body);
    }

    protected async fetchReverseGeocode(point: Coordinate): Promise<Address[]> {
        const body = await this.transport.getJson('geocode/reverse', {
            lat: point.latitude,
            lon: point.longitude,
            format: 'json',
        });
        return toAddresses(body);
    }

    protected async fetchAutocomplete(query: string, limit: number): Promise<AutocompleteResult[]> {
        const body = await this.transport.getJson('geocode/autocomplete', {
            text: query,
            limit,
            format: 'json',
        });
        return toAutocompleteResults(body);
    }

    protected async fetchDistanceMatrix(request: MatrixRequest): Promise<DistanceMatrixResult> {
        // Matrix locations are [lon, lat]
        const payload: GeoapifyMatrixRequestBody = {
            mode: request.modeToken,
            units: 'metric',
            sources: request.sources.map((source) => ({ location: source.toLonLat() })),
            targets: request.targets.map((target) => ({ location: target.toLonLat() })),
        };
        const body = await this.transport.postJson('routematrix', payload);
        return toDistanceMatrix(body, request);
    }

    protected async fetchRoute(request: RouteRequest): Promise<RouteInfo> {
        const body = await this.transport.getJson('routing', {
            // Waypoints are lat,lon pairs joined by |
            waypoints: `${request.source.toString()}|${request.target.toString()}`,
            mode: request.modeToken,
            units: 'metric',
            format: 'json',
        });
        return toRouteInfo(body, request.mode);
    }

    protected async release(): Promise<void> {
        this.transport.close();
    }
}
