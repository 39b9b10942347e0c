import { DistanceUnit, TravelMode } from '@/shared/types/common.types';
import { convertDistance, metersToKilometers, secondsToMinutes } from '@/shared/utils/units';
import { ValidationError } from '../errors';

/**
 * Distance and travel time of a single route.
 *
 * Meters and seconds are the stored values; kilometers and minutes are
 * always computed from them, never the other way round.
 */
export class RouteInfo {
    public readonly distanceMeters: number;
    public readonly durationSeconds: number;
    public readonly mode: TravelMode;

    /**
     * @throws {ValidationError} If distance or duration is negative or not finite
     */
    constructor(distanceMeters: number, durationSeconds: number, mode: TravelMode = TravelMode.DRIVING) {
        assertNonNegative(distanceMeters, 'distanceMeters');
        assertNonNegative(durationSeconds, 'durationSeconds');
        this.distanceMeters = distanceMeters;
        this.durationSeconds = durationSeconds;
        this.mode = mode;
        Object.freeze(this);
    }

    get distanceKm(): number {
        return metersToKilometers(this.distanceMeters);
    }

    get durationMinutes(): number {
        return secondsToMinutes(this.durationSeconds);
    }

    /**
     * Distance converted for display
     */
    distanceIn(unit: DistanceUnit): number {
        return convertDistance(this.distanceMeters, unit);
    }

    toJSON() {
        return {
            distanceMeters: this.distanceMeters,
            durationSeconds: this.durationSeconds,
            distanceKm: this.distanceKm,
            durationMinutes: this.durationMinutes,
            mode: this.mode,
        };
    }
}

function assertNonNegative(value: number, field: string): void {
    if (!Number.isFinite(value) || value < 0) {
        throw new ValidationError(`${field} must be a non-negative number`, [
            `${field}: Expected a finite number >= 0, received ${value}`,
        ]);
    }
}
