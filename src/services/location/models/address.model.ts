/**
 * Structured postal address fields; every field is optional
 */
export interface AddressFields {
    street?: string | undefined;
    houseNumber?: string | undefined;
    city?: string | undefined;
    postcode?: string | undefined;
    state?: string | undefined;
    country?: string | undefined;
    /** ISO 3166-1 alpha-2, stored lower-case */
    countryCode?: string | undefined;
    /** Vendor-formatted single-line address */
    formattedAddress?: string | undefined;
}

const POSTAL_FIELDS = [
    'street',
    'houseNumber',
    'city',
    'postcode',
    'state',
    'country',
    'countryCode',
] as const;

type QueryField = 'street' | 'houseNumber' | 'city' | 'postcode' | 'state' | 'country';

/**
 * Query parameter names for structured address search
 */
const QUERY_PARAM_NAMES: ReadonlyArray<readonly [QueryField, string]> = [
    ['street', 'street'],
    ['houseNumber', 'housenumber'],
    ['city', 'city'],
    ['postcode', 'postcode'],
    ['state', 'state'],
    ['country', 'country'],
];

/**
 * Immutable postal address.
 *
 * Missing or blank fields are stored as absent, never as empty strings,
 * so toJSON and toQueryParams only ever contain values the vendor supplied.
 */
export class Address {
    public readonly street: string | undefined;
    public readonly houseNumber: string | undefined;
    public readonly city: string | undefined;
    public readonly postcode: string | undefined;
    public readonly state: string | undefined;
    public readonly country: string | undefined;
    public readonly countryCode: string | undefined;
    public readonly formattedAddress: string | undefined;

    constructor(fields: AddressFields = {}) {
        this.street = clean(fields.street);
        this.houseNumber = clean(fields.houseNumber);
        this.city = clean(fields.city);
        this.postcode = clean(fields.postcode);
        this.state = clean(fields.state);
        this.country = clean(fields.country);
        this.countryCode = clean(fields.countryCode)?.toLowerCase();
        this.formattedAddress = clean(fields.formattedAddress);
        Object.freeze(this);
    }

    /**
     * Human-readable single line.
     * Uses the vendor's formatting when available, otherwise composes
     * "<houseNumber> <street>, <postcode> <city>, <state>, <country>".
     */
    get formatted(): string {
        if (this.formattedAddress) {
            return this.formattedAddress;
        }

        const line1 = joinPresent([this.houseNumber, this.street], ' ');
        const line2 = joinPresent([this.postcode, this.city], ' ');
        return joinPresent([line1, line2, this.state, this.country], ', ');
    }

    /** True when no postal field is known */
    get isEmpty(): boolean {
        return POSTAL_FIELDS.every((field) => this[field] === undefined);
    }

    /**
     * Non-empty fields as structured-search query parameters
     */
    toQueryParams(): Record<string, string> {
        const params: Record<string, string> = {};
        for (const [field, param] of QUERY_PARAM_NAMES) {
            const value = this[field];
            if (value !== undefined) {
                params[param] = value;
            }
        }
        return params;
    }

    toJSON(): AddressFields {
        const json: AddressFields = {};
        for (const field of [...POSTAL_FIELDS, 'formattedAddress'] as const) {
            const value = this[field];
            if (value !== undefined) {
                json[field] = value;
            }
        }
        return json;
    }

    toString(): string {
        return this.formatted;
    }
}

function clean(value: string | undefined): string | undefined {
    if (typeof value !== 'string') {
        return undefined;
    }
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
}

function joinPresent(parts: Array<string | undefined>, separator: string): string {
    return parts.filter((part): part is string => Boolean(part)).join(separator);
}
