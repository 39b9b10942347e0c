import type { z } from 'zod';
import type { TravelMode } from '@/shared/types/common.types';
import { coordinateSchema } from '@/shared/utils/validators';
import { APIError, NoRouteError } from '../../errors';
import {
    Address,
    AutocompleteResult,
    Coordinate,
    DistanceMatrixResult,
    GeocodingResult,
    RouteInfo,
    type MatrixCell,
} from '../../models';
import type { MatrixRequest } from '../base-location.adapter';
import {
    geoapifyMatrixResponseSchema,
    geoapifyPlacesResponseSchema,
    geoapifyRoutingResponseSchema,
    type GeoapifyPlace,
} from './geoapify.types';

const VENDOR = 'Geoapify';

/**
 * Geoapify → canonical model
 *
 * Every function here takes the untrusted JSON body and either returns
 * canonical records or throws APIError. Vendor content never produces a
 * ValidationError.
 */

/**
 * Validate a response body against a wire schema
 */
function parseResponse<T extends z.ZodTypeAny>(schema: T, body: unknown, operation: string): z.output<T> {
    const result = schema.safeParse(body);
    if (!result.success) {
        throw new APIError(`${VENDOR} returned an unexpected ${operation} response`, {
            vendorCode: 'UNEXPECTED_SCHEMA',
            responseBody: body,
            cause: result.error,
        });
    }
    return result.data;
}

/**
 * Clamp a vendor confidence score into [0, 1]
 *
 * @returns undefined when the vendor value is missing or not a finite number
 */
function normalizeConfidence(value: unknown): number | undefined {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        return undefined;
    }
    return Math.min(1, Math.max(0, value));
}

function toAddress(place: GeoapifyPlace): Address {
    return new Address({
        street: place.street,
        houseNumber: place.housenumber,
        city: place.city,
        postcode: place.postcode,
        state: place.state,
        country: place.country,
        countryCode: place.country_code,
        formattedAddress: place.formatted,
    });
}

/**
 * Build a coordinate from a vendor lat/lon pair
 *
 * @returns undefined when either value is missing
 * @throws {APIError} If the vendor sent an out-of-range point
 */
function toCoordinate(lat: number | undefined, lon: number | undefined): Coordinate | undefined {
    if (lat === undefined || lon === undefined) {
        return undefined;
    }
    const valid = coordinateSchema.safeParse({ latitude: lat, longitude: lon });
    if (!valid.success) {
        throw new APIError(`${VENDOR} returned an invalid coordinate (${lat}, ${lon})`, {
            vendorCode: 'UNEXPECTED_SCHEMA',
            cause: valid.error,
        });
    }
    return new Coordinate(valid.data.latitude, valid.data.longitude);
}

/**
 * geocode/search → GeocodingResult[]; results without a position are skipped
 */
export function toGeocodingResults(body: unknown): GeocodingResult[] {
    const { results } = parseResponse(geoapifyPlacesResponseSchema, body, 'geocode');
    const matches: GeocodingResult[] = [];

    for (const place of results) {
        const coordinate = toCoordinate(place.lat, place.lon);
        if (!coordinate) {
            // Match without a position
            continue;
        }
        matches.push(new GeocodingResult({
            coordinate,
            address: toAddress(place),
            confidence: normalizeConfidence(place.rank?.confidence),
            buildingConfidence: normalizeConfidence(place.rank?.confidence_building_level),
            streetConfidence: normalizeConfidence(place.rank?.confidence_street_level),
            cityConfidence: normalizeConfidence(place.rank?.confidence_city_level),
            resultType: place.result_type,
            matchType: place.rank?.match_type,
            raw: place,
        }));
    }

    return matches;
}

/**
 * geocode/reverse → Address[]
 */
export function toAddresses(body: unknown): Address[] {
    const { results } = parseResponse(geoapifyPlacesResponseSchema, body, 'reverse geocode');
    return results.map(toAddress);
}

/**
 * geocode/autocomplete → AutocompleteResult[] ranked 1..n in vendor order
 */
export function toAutocompleteResults(body: unknown): AutocompleteResult[] {
    const { results } = parseResponse(geoapifyPlacesResponseSchema, body, 'autocomplete');
    return results.map((place, index) => new AutocompleteResult({
        address: toAddress(place),
        rank: index + 1,
        coordinate: toCoordinate(place.lat, place.lon),
        confidence: normalizeConfidence(place.rank?.confidence),
        resultType: place.result_type,
        raw: place,
    }));
}

/**
 * routematrix → DistanceMatrixResult
 *
 * Cells are placed by their source_index/target_index. Pairs the vendor
 * leaves out, or reports with a null distance/time, stay null.
 */
export function toDistanceMatrix(body: unknown, request: MatrixRequest): DistanceMatrixResult {
    const { sources_to_targets: rows } = parseResponse(geoapifyMatrixResponseSchema, body, 'route matrix');
    const sourceCount = request.sources.length;
    const targetCount = request.targets.length;

    const distances = emptyTable(sourceCount, targetCount);
    const durations = emptyTable(sourceCount, targetCount);

    // Place each cell by its own indices; Geoapify may omit unreachable pairs
    for (const row of rows) {
        for (const cell of row) {
            const distanceRow = distances[cell.source_index];
            const durationRow = durations[cell.source_index];
            if (!distanceRow || !durationRow || cell.target_index >= targetCount) {
                throw new APIError(
                    `${VENDOR} returned a matrix cell outside the ${sourceCount}×${targetCount} request ` +
                    `(${cell.source_index}, ${cell.target_index})`,
                    { vendorCode: 'UNEXPECTED_SCHEMA', responseBody: body }
                );
            }
            distanceRow[cell.target_index] = toMetric(cell.distance);
            durationRow[cell.target_index] = toMetric(cell.time);
        }
    }

    return new DistanceMatrixResult({
        distances,
        durations,
        sources: request.sources,
        targets: request.targets,
        mode: request.mode,
        units: request.units,
    });
}

/**
 * routing → RouteInfo
 *
 * @throws {NoRouteError} If the vendor returned no route
 */
export function toRouteInfo(body: unknown, mode: TravelMode): RouteInfo {
    const { results } = parseResponse(geoapifyRoutingResponseSchema, body, 'routing');
    // First result is the recommended route
    const [best] = results;

    if (!best) {
        throw new NoRouteError(`${VENDOR} found no route between the provided locations`, {
            responseBody: body,
        });
    }

    if (best.distance < 0 || best.time < 0) {
        throw new APIError(`${VENDOR} returned a negative route distance or duration`, {
            vendorCode: 'UNEXPECTED_SCHEMA',
            responseBody: body,
        });
    }

    return new RouteInfo(best.distance, best.time, mode);
}

function emptyTable(rows: number, columns: number): MatrixCell[][] {
    return Array.from({ length: rows }, () => Array.from({ length: columns }, (): MatrixCell => null));
}

function toMetric(value: number | null | undefined): MatrixCell {
    return value === undefined || value === null || value < 0 ? null : value;
}
