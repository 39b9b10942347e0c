/**
 * location-sdk
 *
 * One API for geocoding, reverse geocoding, autocomplete, distance matrices
 * and routing, backed by pluggable vendor adapters.
 */

// Client
export { LocationClient, withLocationClient } from './services/location/location-client.service';

// Contract and adapters
export type { LocationProvider } from './services/location/adapters/location-provider.interface';
export {
    BaseLocationAdapter,
    DEFAULT_AUTOCOMPLETE_LIMIT,
    type BaseAdapterOptions,
    type MatrixRequest,
    type RouteRequest,
} from './services/location/adapters/base-location.adapter';
export {
    GeoapifyAdapter,
    GEOAPIFY_BASE_URL,
    GEOAPIFY_DEFAULT_TIMEOUT_MS,
    type GeoapifyAdapterOptions,
} from './services/location/adapters/geoapify/geoapify.adapter';
export type { FetchLike } from './services/location/transport/http.transport';

// Canonical model
export * from './services/location/models';
export {
    TravelMode,
    DistanceUnit,
    type ConfidenceTier,
    type CoordinateLike,
    type ProviderLimits,
    type LogLevel,
} from './shared/types/common.types';
export { convertDistance, metersToKilometers, secondsToMinutes } from './shared/utils/units';

// Errors
export {
    LocationSDKError,
    ValidationError,
    AuthenticationError,
    RateLimitError,
    APIError,
    NoRouteError,
    isLocationSDKError,
    type APIErrorDetails,
} from './services/location/errors';

// Configuration and logging
export { loadConfig, logConfigSummary, type LocationSDKConfig } from './shared/config/config';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './shared/utils/logger';
