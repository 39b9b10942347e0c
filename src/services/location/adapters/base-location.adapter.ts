import { z } from 'zod';
import {
    DistanceUnit,
    TravelMode,
    type CoordinateLike,
    type ProviderLimits,
    type ProviderOperation,
} from '@/shared/types/common.types';
import {
    type Logger,
    logProviderFailure,
    logProviderRequest,
    logProviderResponse,
    silentLogger,
} from '@/shared/utils/logger';
import { autocompleteLimitSchema, parseOrThrow, validateQuery } from '@/shared/utils/validators';
import { addSpanAttributes, withProviderSpan } from '@/shared/utils/tracing-utils';
import { APIError, LocationSDKError, ValidationError } from '../errors';
import {
    Coordinate,
    type Address,
    type AutocompleteResult,
    type DistanceMatrixResult,
    type GeocodingResult,
    type RouteInfo,
} from '../models';
import type { LocationProvider } from './location-provider.interface';

export const DEFAULT_AUTOCOMPLETE_LIMIT = 5;

/**
 * Options shared by every adapter
 */
export interface BaseAdapterOptions {
    /** Structured logger; the SDK is silent when omitted */
    logger?: Logger | undefined;
}

/**
 * Validated distance matrix request handed to an adapter
 */
export interface MatrixRequest {
    sources: Coordinate[];
    targets: Coordinate[];
    mode: TravelMode;
    /** Vendor token for `mode` */
    modeToken: string;
    units: DistanceUnit;
}

/**
 * Validated route request handed to an adapter
 */
export interface RouteRequest {
    source: Coordinate;
    target: Coordinate;
    mode: TravelMode;
    /** Vendor token for `mode` */
    modeToken: string;
}

const travelModeSchema = z.nativeEnum(TravelMode, {
    errorMap: () => ({ message: `Expected one of ${Object.values(TravelMode).join(', ')}` }),
});

const distanceUnitSchema = z.nativeEnum(DistanceUnit, {
    errorMap: () => ({ message: `Expected one of ${Object.values(DistanceUnit).join(', ')}` }),
});

/**
 * Base Location Adapter
 *
 * Implements the public contract once: input validation, mode resolution,
 * result truncation, logging, tracing and error normalization. Concrete
 * adapters only implement the `fetch*` hooks, which receive validated input
 * and perform the single vendor call.
 */
export abstract class BaseLocationAdapter implements LocationProvider {
    abstract readonly name: string;
    abstract readonly limits: ProviderLimits;

    /**
     * TravelMode → vendor token. Modes left out are unsupported and
     * rejected with ValidationError, never substituted.
     */
    protected abstract readonly travelModes: Readonly<Partial<Record<TravelMode, string>>>;

    protected readonly logger: Logger;
    private closed = false;

    constructor(options: BaseAdapterOptions = {}) {
        this.logger = options.logger ?? silentLogger;
    }

    get supportedModes(): readonly TravelMode[] {
        return Object.values(TravelMode).filter((mode) => this.travelModes[mode] !== undefined);
    }

    get isClosed(): boolean {
        return this.closed;
    }

    async geocode(query: string): Promise<GeocodingResult[]> {
        const text = validateQuery(query);
        return this.execute('geocode', { query: text }, () => this.fetchGeocode(text), (results) => results.length);
    }

    async reverseGeocode(point: CoordinateLike): Promise<Address[]> {
        const location = Coordinate.from(point, 'point');
        return this.execute(
            'reverseGeocode',
            { point: location.toString() },
            () => this.fetchReverseGeocode(location),
            (addresses) => addresses.length
        );
    }

    async autocomplete(query: string, limit: number = DEFAULT_AUTOCOMPLETE_LIMIT): Promise<AutocompleteResult[]> {
        const text = validateQuery(query);
        const max = parseOrThrow(autocompleteLimitSchema(this.limits.maxAutocompleteLimit), limit, 'limit');

        return this.execute(
            'autocomplete',
            { query: text, limit: max },
            // Vendors may return more than asked
            async () => (await this.fetchAutocomplete(text, max)).slice(0, max),
            (results) => results.length
        );
    }

    async distanceMatrix(
        sources: CoordinateLike[],
        targets: CoordinateLike[],
        mode: TravelMode = TravelMode.DRIVING,
        units: DistanceUnit = DistanceUnit.KILOMETERS
    ): Promise<DistanceMatrixResult> {
        const request: MatrixRequest = {
            sources: this.validatePoints(sources, 'sources', this.limits.maxMatrixSources),
            targets: this.validatePoints(targets, 'targets', this.limits.maxMatrixTargets),
            mode,
            modeToken: this.resolveMode(mode),
            units: parseOrThrow(distanceUnitSchema, units, 'units'),
        };

        return this.execute(
            'distanceMatrix',
            { sources: request.sources.length, targets: request.targets.length, mode },
            async () => {
                const matrix = await this.fetchDistanceMatrix(request);
                if (matrix.rowCount !== request.sources.length || matrix.columnCount !== request.targets.length) {
                    throw new APIError(
                        `${this.name} returned a ${matrix.rowCount}×${matrix.columnCount} matrix for a ` +
                        `${request.sources.length}×${request.targets.length} request`
                    );
                }
                return matrix;
            }
        );
    }

    async route(
        source: CoordinateLike,
        target: CoordinateLike,
        mode: TravelMode = TravelMode.DRIVING
    ): Promise<RouteInfo> {
        const request: RouteRequest = {
            source: Coordinate.from(source, 'source'),
            target: Coordinate.from(target, 'target'),
            mode,
            modeToken: this.resolveMode(mode),
        };

        return this.execute(
            'route',
            { source: request.source.toString(), target: request.target.toString(), mode },
            () => this.fetchRoute(request)
        );
    }

    /**
     * Release the transport. Safe to call more than once.
     */
    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        await this.release();
        this.logger.debug({ event: 'location.provider.closed', provider: this.name }, 'Provider closed');
    }

    protected abstract fetchGeocode(query: string): Promise<GeocodingResult[]>;

    protected abstract fetchReverseGeocode(point: Coordinate): Promise<Address[]>;

    protected abstract fetchAutocomplete(query: string, limit: number): Promise<AutocompleteResult[]>;

    protected abstract fetchDistanceMatrix(request: MatrixRequest): Promise<DistanceMatrixResult>;

    protected abstract fetchRoute(request: RouteRequest): Promise<RouteInfo>;

    /** Free transport resources; called once by close() */
    protected abstract release(): Promise<void>;

    /**
     * Look up the vendor token for a travel mode
     *
     * @throws {ValidationError} If the adapter has no token for the mode
     */
    protected resolveMode(mode: TravelMode): string {
        const known = parseOrThrow(travelModeSchema, mode, 'mode');
        // Own keys only; inherited names such as toString are not tokens
        const token = Object.hasOwn(this.travelModes, known) ? this.travelModes[known] : undefined;
        if (token === undefined) {
            const supported = this.supportedModes.join(', ');
            throw new ValidationError(
                `${this.name} does not support travel mode "${known}"`,
                [`mode: Expected one of ${supported}`]
            );
        }
        return token;
    }

    private validatePoints(points: CoordinateLike[], label: string, max: number): Coordinate[] {
        if (!Array.isArray(points)) {
            throw new ValidationError(`${label} must be a list of coordinates`, [`${label}: Expected an array`]);
        }
        if (points.length === 0) {
            throw new ValidationError(`${label} must not be empty`, [`${label}: Expected at least 1 coordinate`]);
        }
        if (points.length > max) {
            throw new ValidationError(
                `${this.name} supports at most ${max} ${label} per request, received ${points.length}`,
                [`${label}: Expected at most ${max} coordinates`]
            );
        }
        return points.map((point, index) => Coordinate.from(point, `${label}[${index}]`));
    }

    /**
     * Run one vendor call with logging, a span, and error normalization
     */
    private async execute<T>(
        operation: ProviderOperation,
        attributes: Record<string, string | number>,
        call: () => Promise<T>,
        count?: (result: T) => number
    ): Promise<T> {
        if (this.closed) {
            throw new APIError(`${this.name} provider is closed`, { vendorCode: 'CLIENT_CLOSED' });
        }

        const startedAt = Date.now();
        logProviderRequest(this.logger, { provider: this.name, operation, ...attributes });

        return withProviderSpan({ provider: this.name, operation, attributes }, async (span) => {
            try {
                const result = await call();
                const resultCount = count?.(result);
                addSpanAttributes(span, { 'location.result_count': resultCount });
                logProviderResponse(this.logger, {
                    provider: this.name,
                    operation,
                    durationMs: Date.now() - startedAt,
                    resultCount,
                });
                return result;
            } catch (error) {
                // The span and the caller both see the normalized error
                const sdkError = this.normalizeError(error);
                logProviderFailure(this.logger, {
                    provider: this.name,
                    operation,
                    durationMs: Date.now() - startedAt,
                    error: sdkError,
                });
                throw sdkError;
            }
        });
    }

    private normalizeError(error: unknown): LocationSDKError {
        if (error instanceof LocationSDKError) {
            return error;
        }
        const message = error instanceof Error ? error.message : String(error);
        return new APIError(`${this.name} adapter failed: ${message}`, { cause: error });
    }
}
