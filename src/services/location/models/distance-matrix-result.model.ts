import { DistanceUnit, TravelMode } from '@/shared/types/common.types';
import { convertDistance } from '@/shared/utils/units';
import { ValidationError } from '../errors';
import type { Coordinate } from './coordinate.model';

/**
 * Matrix cell; null marks an unreachable or missing pair
 */
export type MatrixCell = number | null;

export interface DistanceMatrixResultInit {
    /** distances[i][j] in meters from sources[i] to targets[j] */
    distances: MatrixCell[][];
    /** durations[i][j] in seconds from sources[i] to targets[j] */
    durations: MatrixCell[][];
    sources: Coordinate[];
    targets: Coordinate[];
    mode: TravelMode;
    /** Display unit requested by the caller */
    units: DistanceUnit;
}

/**
 * Source × target distances and durations
 */
export class DistanceMatrixResult {
    public readonly distances: ReadonlyArray<ReadonlyArray<MatrixCell>>;
    public readonly durations: ReadonlyArray<ReadonlyArray<MatrixCell>>;
    public readonly sources: ReadonlyArray<Coordinate>;
    public readonly targets: ReadonlyArray<Coordinate>;
    public readonly mode: TravelMode;
    public readonly units: DistanceUnit;

    /**
     * @throws {ValidationError} If either table is not sources × targets
     */
    constructor(init: DistanceMatrixResultInit) {
        assertShape(init.distances, init.sources.length, init.targets.length, 'distances');
        assertShape(init.durations, init.sources.length, init.targets.length, 'durations');

        this.distances = freezeTable(init.distances);
        this.durations = freezeTable(init.durations);
        this.sources = Object.freeze([...init.sources]);
        this.targets = Object.freeze([...init.targets]);
        this.mode = init.mode;
        this.units = init.units;
        Object.freeze(this);
    }

    /** Number of rows (sources) */
    get rowCount(): number {
        return this.sources.length;
    }

    /** Number of columns (targets) */
    get columnCount(): number {
        return this.targets.length;
    }

    /**
     * Distance in meters, or null when unreachable
     */
    distanceBetween(sourceIndex: number, targetIndex: number): MatrixCell {
        return this.distances[sourceIndex]?.[targetIndex] ?? null;
    }

    /**
     * Duration in seconds, or null when unreachable
     */
    durationBetween(sourceIndex: number, targetIndex: number): MatrixCell {
        return this.durations[sourceIndex]?.[targetIndex] ?? null;
    }

    /**
     * Distance table converted for display; nulls are preserved
     *
     * @param unit - Defaults to the unit requested with the matrix
     */
    distancesIn(unit: DistanceUnit = this.units): MatrixCell[][] {
        return this.distances.map((row) =>
            row.map((meters) => (meters === null ? null : convertDistance(meters, unit)))
        );
    }

    toJSON() {
        return {
            distances: this.distances,
            durations: this.durations,
            sources: this.sources.map((source) => source.toJSON()),
            targets: this.targets.map((target) => target.toJSON()),
            mode: this.mode,
            units: this.units,
        };
    }
}

/**
 * Check that a table is exactly rows × columns
 */
function hasShape(table: ReadonlyArray<ReadonlyArray<unknown>>, rows: number, columns: number): boolean {
    return table.length === rows && table.every((row) => row.length === columns);
}

function assertShape(table: MatrixCell[][], rows: number, columns: number, name: string): void {
    if (!hasShape(table, rows, columns)) {
        throw new ValidationError(`${name} must be a ${rows}×${columns} table`, [
            `${name}: Expected ${rows} rows of ${columns} columns`,
        ]);
    }
}

function freezeTable(table: MatrixCell[][]): ReadonlyArray<ReadonlyArray<MatrixCell>> {
    return Object.freeze(table.map((row) => Object.freeze([...row])));
}
