import type { ConfidenceTier } from '@/shared/types/common.types';
import type { Address } from './address.model';
import type { Coordinate } from './coordinate.model';

/**
 * Fixed confidence thresholds, lowest bound of each tier (inclusive).
 * Scores below `city` fall into `region`.
 */
export const CONFIDENCE_TIER_THRESHOLDS = {
    building: 0.9,
    street: 0.7,
    city: 0.4,
} as const;

/**
 * Classify a confidence score into a coarse tier
 *
 * @param confidence - Score in [0, 1], or undefined when the vendor gave none
 */
export function confidenceTier(confidence: number | undefined): ConfidenceTier {
    if (confidence === undefined || Number.isNaN(confidence)) {
        return 'unknown';
    }
    if (confidence >= CONFIDENCE_TIER_THRESHOLDS.building) {
        return 'building';
    }
    if (confidence >= CONFIDENCE_TIER_THRESHOLDS.street) {
        return 'street';
    }
    if (confidence >= CONFIDENCE_TIER_THRESHOLDS.city) {
        return 'city';
    }
    return 'region';
}

export interface GeocodingResultInit {
    coordinate: Coordinate;
    address: Address;
    /** Overall confidence in [0, 1] */
    confidence?: number | undefined;
    buildingConfidence?: number | undefined;
    streetConfidence?: number | undefined;
    cityConfidence?: number | undefined;
    /** Vendor result type (e.g., building, street, city) */
    resultType?: string | undefined;
    /** Vendor match type (e.g., full_match, inner_part) */
    matchType?: string | undefined;
    /** Untouched vendor payload, for diagnostics */
    raw?: unknown;
}

/**
 * One forward-geocoding match
 */
export class GeocodingResult {
    public readonly coordinate: Coordinate;
    public readonly address: Address;
    public readonly confidence: number | undefined;
    public readonly buildingConfidence: number | undefined;
    public readonly streetConfidence: number | undefined;
    public readonly cityConfidence: number | undefined;
    public readonly resultType: string | undefined;
    public readonly matchType: string | undefined;
    public readonly raw: unknown;

    constructor(init: GeocodingResultInit) {
        this.coordinate = init.coordinate;
        this.address = init.address;
        this.confidence = init.confidence;
        this.buildingConfidence = init.buildingConfidence;
        this.streetConfidence = init.streetConfidence;
        this.cityConfidence = init.cityConfidence;
        this.resultType = init.resultType;
        this.matchType = init.matchType;
        this.raw = init.raw;
        Object.freeze(this);
    }

    /** Derived from confidence on every read */
    get tier(): ConfidenceTier {
        return confidenceTier(this.confidence);
    }

    toJSON() {
        return {
            coordinate: this.coordinate.toJSON(),
            address: this.address.toJSON(),
            confidence: this.confidence,
            tier: this.tier,
            buildingConfidence: this.buildingConfidence,
            streetConfidence: this.streetConfidence,
            cityConfidence: this.cityConfidence,
            resultType: this.resultType,
            matchType: this.matchType,
        };
    }
}
