import type { CoordinateLike } from '@/shared/types/common.types';
import { validateCoordinate } from '@/shared/utils/validators';
import { ValidationError } from '../errors';

// Decimal, optionally with an exponent; no 0x/0b/0o prefixes or Infinity
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * WGS-84 point. Immutable; construction validates the range.
 */
export class Coordinate implements CoordinateLike {
    public readonly latitude: number;
    public readonly longitude: number;

    /**
     * @throws {ValidationError} If latitude or longitude is out of range
     */
    constructor(latitude: number, longitude: number, label: string = 'coordinate') {
        const valid = validateCoordinate({ latitude, longitude }, label);
        this.latitude = valid.latitude;
        this.longitude = valid.longitude;
        Object.freeze(this);
    }

    /**
     * Build (and re-validate) a Coordinate from any lat/lon pair
     *
     * @param value - Coordinate instance or plain object
     * @param label - Name used in validation messages (e.g., sources[2])
     */
    static from(value: CoordinateLike, label: string = 'coordinate'): Coordinate {
        if (value === null || typeof value !== 'object') {
            throw new ValidationError(`${label} must be an object with latitude and longitude`, [
                `${label}: Expected an object with latitude and longitude`,
            ]);
        }
        return new Coordinate(value.latitude, value.longitude, label);
    }

    /**
     * Parse the "lat,lon" string form
     *
     * @example
     * Coordinate.parse('48.8566,2.3522');
     */
    static parse(text: string): Coordinate {
        const parts = text.split(',');
        if (parts.length !== 2) {
            throw new ValidationError(`Invalid coordinate string "${text}"`, [
                'coordinate: Expected "lat,lon"',
            ]);
        }

        const [lat = '', lon = ''] = parts.map((part) => part.trim());
        if (lat === '' || lon === '') {
            throw new ValidationError(`Invalid coordinate string "${text}"`, [
                'coordinate: Latitude and longitude are required',
            ]);
        }

        if (!DECIMAL_PATTERN.test(lat) || !DECIMAL_PATTERN.test(lon)) {
            throw new ValidationError(`Invalid coordinate string "${text}"`, [
                'coordinate: Latitude and longitude must be decimal numbers',
            ]);
        }

        return new Coordinate(Number(lat), Number(lon));
    }

    equals(other: CoordinateLike): boolean {
        return this.latitude === other.latitude && this.longitude === other.longitude;
    }

    /** [lon, lat] order used by GeoJSON and most routing APIs */
    toLonLat(): [number, number] {
        return [this.longitude, this.latitude];
    }

    toJSON(): CoordinateLike {
        return { latitude: this.latitude, longitude: this.longitude };
    }

    toString(): string {
        return `${this.latitude},${this.longitude}`;
    }
}
