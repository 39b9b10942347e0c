import type {
    CoordinateLike,
    DistanceUnit,
    ProviderLimits,
    TravelMode,
} from '@/shared/types/common.types';
import type {
    Address,
    AutocompleteResult,
    DistanceMatrixResult,
    GeocodingResult,
    RouteInfo,
} from '../models';

/**
 * Location Provider Interface
 *
 * Defines the contract every mapping vendor adapter satisfies.
 * Inputs are validated before any network call; failures surface as
 * LocationSDKError subclasses only.
 *
 * Implementations: Geoapify
 */
export interface LocationProvider {
    /** Vendor name, used in logs and error messages */
    readonly name: string;

    /** Request ceilings declared by the adapter */
    readonly limits: ProviderLimits;

    /** Travel modes the vendor can serve */
    readonly supportedModes: readonly TravelMode[];

    /**
     * Convert free text to coordinates
     *
     * @param query - Address or place name
     * @returns Matches in vendor relevance order
     * @throws {ValidationError} If the query is empty or whitespace
     */
    geocode(query: string): Promise<GeocodingResult[]>;

    /**
     * Convert coordinates to addresses
     *
     * @throws {ValidationError} If the point is out of range
     */
    reverseGeocode(point: CoordinateLike): Promise<Address[]>;

    /**
     * Suggest addresses for partial input
     *
     * @param query - Partial address
     * @param limit - Maximum suggestions (default 5)
     * @returns At most `limit` suggestions
     */
    autocomplete(query: string, limit?: number): Promise<AutocompleteResult[]>;

    /**
     * Distances and durations between every source and every target
     *
     * @param units - Display unit recorded on the result; tables stay metric
     * @throws {ValidationError} If a list is empty, exceeds the adapter ceiling,
     *   or the mode is unsupported
     */
    distanceMatrix(
        sources: CoordinateLike[],
        targets: CoordinateLike[],
        mode?: TravelMode,
        units?: DistanceUnit
    ): Promise<DistanceMatrixResult>;

    /**
     * Distance and duration of the best route between two points
     *
     * @throws {NoRouteError} If the vendor finds no path
     */
    route(source: CoordinateLike, target: CoordinateLike, mode?: TravelMode): Promise<RouteInfo>;

    /**
     * Release the transport; idempotent
     */
    close(): Promise<void>;

    /** True once close() has been called */
    readonly isClosed: boolean;
}
