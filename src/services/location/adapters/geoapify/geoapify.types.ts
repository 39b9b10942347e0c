import { z } from 'zod';

/**
 * Geoapify wire format (format=json)
 * API Docs: https://apidocs.geoapify.com/
 *
 * Unknown keys pass through and most fields are optional; only shapes the
 * adapter cannot map are rejected.
 */

/**
 * `rank` block attached to geocoding results
 */
const geoapifyRankSchema = z
    .object({
        confidence: z.unknown().optional(),
        confidence_building_level: z.unknown().optional(),
        confidence_street_level: z.unknown().optional(),
        confidence_city_level: z.unknown().optional(),
        match_type: z.string().optional(),
        importance: z.unknown().optional(),
    })
    .passthrough();

/**
 * One geocoding / reverse geocoding / autocomplete result
 */
const geoapifyPlaceSchema = z
    .object({
        lat: z.number().optional(),
        lon: z.number().optional(),
        formatted: z.string().optional(),
        street: z.string().optional(),
        housenumber: z.string().optional(),
        city: z.string().optional(),
        postcode: z.string().optional(),
        state: z.string().optional(),
        country: z.string().optional(),
        country_code: z.string().optional(),
        result_type: z.string().optional(),
        rank: geoapifyRankSchema.optional(),
    })
    .passthrough();

export const geoapifyPlacesResponseSchema = z
    .object({
        results: z.array(geoapifyPlaceSchema),
    })
    .passthrough();

/**
 * One routematrix cell; distance/time are absent or null when unreachable
 */
const geoapifyMatrixCellSchema = z
    .object({
        distance: z.number().nullable().optional(),
        time: z.number().nullable().optional(),
        source_index: z.number().int().nonnegative(),
        target_index: z.number().int().nonnegative(),
    })
    .passthrough();

export const geoapifyMatrixResponseSchema = z
    .object({
        sources_to_targets: z.array(z.array(geoapifyMatrixCellSchema)),
    })
    .passthrough();

/**
 * One routing result; distance in meters, time in seconds (units=metric)
 */
const geoapifyRouteSchema = z
    .object({
        distance: z.number(),
        time: z.number(),
        mode: z.string().optional(),
    })
    .passthrough();

export const geoapifyRoutingResponseSchema = z
    .object({
        results: z.array(geoapifyRouteSchema),
    })
    .passthrough();

/**
 * Routematrix POST body
 */
export interface GeoapifyMatrixRequestBody {
    mode: string;
    units: 'metric';
    sources: Array<{ location: [number, number] }>;
    targets: Array<{ location: [number, number] }>;
}

export type GeoapifyPlace = z.infer<typeof geoapifyPlaceSchema>;
