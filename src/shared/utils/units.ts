import { DistanceUnit } from '../types/common.types';

/**
 * Meters per display unit
 */
const METERS_PER_UNIT: Readonly<Record<DistanceUnit, number>> = {
    [DistanceUnit.METERS]: 1,
    [DistanceUnit.KILOMETERS]: 1000,
    [DistanceUnit.MILES]: 1609.344,
};

/**
 * Convert a distance in meters to a display unit
 *
 * @param meters - Distance in meters
 * @param unit - Target display unit
 */
export function convertDistance(meters: number, unit: DistanceUnit): number {
    return meters / METERS_PER_UNIT[unit];
}

export function metersToKilometers(meters: number): number {
    return meters / 1000;
}

export function secondsToMinutes(seconds: number): number {
    return seconds / 60;
}
