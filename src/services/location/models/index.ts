export { Coordinate } from './coordinate.model';
export { Address, type AddressFields } from './address.model';
export {
    GeocodingResult,
    CONFIDENCE_TIER_THRESHOLDS,
    confidenceTier,
    type GeocodingResultInit,
} from './geocoding-result.model';
export { AutocompleteResult, type AutocompleteResultInit } from './autocomplete-result.model';
export { RouteInfo } from './route-info.model';
export {
    DistanceMatrixResult,
    type MatrixCell,
    type DistanceMatrixResultInit,
} from './distance-matrix-result.model';
