/**
 * Common TypeScript types used across the location SDK
 */

/**
 * Travel modes understood by every provider.
 * Each adapter maps these onto its own vendor tokens.
 */
export enum TravelMode {
    DRIVING = 'driving',
    WALKING = 'walking',
    CYCLING = 'cycling',
    TRUCK = 'truck',
}

/**
 * Display units for distances.
 * Results are always stored in meters; conversion happens on request.
 */
export enum DistanceUnit {
    METERS = 'm',
    KILOMETERS = 'km',
    MILES = 'mi',
}

/**
 * Coarse classification of a geocoding confidence score
 */
export type ConfidenceTier = 'building' | 'street' | 'city' | 'region' | 'unknown';

/**
 * Anything carrying a WGS-84 latitude/longitude pair
 */
export interface CoordinateLike {
    latitude: number;
    longitude: number;
}

/**
 * Per-provider request ceilings, checked before any network call
 */
export interface ProviderLimits {
    /** Maximum number of origins in a distance matrix request */
    maxMatrixSources: number;
    /** Maximum number of destinations in a distance matrix request */
    maxMatrixTargets: number;
    /** Maximum autocomplete suggestions per request */
    maxAutocompleteLimit: number;
}

/**
 * Contract operation names, used for logging and span names
 */
export type ProviderOperation =
    | 'geocode'
    | 'reverseGeocode'
    | 'autocomplete'
    | 'distanceMatrix'
    | 'route';

/**
 * Log level accepted by the SDK logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log context for structured logging
 */
export interface LogContext {
    /** Provider name (e.g., geoapify) */
    provider?: string;
    /** Contract operation */
    operation?: ProviderOperation;
    /** Additional context */
    [key: string]: unknown;
}
