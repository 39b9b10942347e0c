import type { Address } from './address.model';
import type { Coordinate } from './coordinate.model';

export interface AutocompleteResultInit {
    address: Address;
    /** 1-based position in vendor order */
    rank: number;
    coordinate?: Coordinate | undefined;
    confidence?: number | undefined;
    resultType?: string | undefined;
    raw?: unknown;
}

/**
 * Address suggestion for partial input. A coordinate is not guaranteed.
 */
export class AutocompleteResult {
    public readonly address: Address;
    public readonly rank: number;
    public readonly coordinate: Coordinate | undefined;
    public readonly confidence: number | undefined;
    public readonly resultType: string | undefined;
    public readonly raw: unknown;

    constructor(init: AutocompleteResultInit) {
        this.address = init.address;
        this.rank = init.rank;
        this.coordinate = init.coordinate;
        this.confidence = init.confidence;
        this.resultType = init.resultType;
        this.raw = init.raw;
        Object.freeze(this);
    }

    /** Text to show in a suggestion list */
    get label(): string {
        return this.address.formatted;
    }

    toJSON() {
        return {
            address: this.address.toJSON(),
            rank: this.rank,
            coordinate: this.coordinate?.toJSON(),
            confidence: this.confidence,
            resultType: this.resultType,
        };
    }
}
