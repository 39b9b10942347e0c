/**
 * Walk through every client operation against the live Geoapify API.
 *
 * Usage: GEOAPIFY_API_KEY=... npm run examples
 */
import {
    APIError,
    AuthenticationError,
    Coordinate,
    DistanceUnit,
    GeoapifyAdapter,
    LocationClient,
    NoRouteError,
    RateLimitError,
    TravelMode,
    ValidationError,
    createLogger,
    loadConfig,
    logConfigSummary,
    withLocationClient,
    type LocationSDKConfig,
} from '../src/index';

function readConfig(): LocationSDKConfig {
    try {
        return loadConfig();
    } catch (error) {
        console.error('❌ Error:', error instanceof Error ? error.message : error);
        console.error('💡 Export GEOAPIFY_API_KEY (see .env.example)');
        process.exit(1);
    }
}

const config = readConfig();

const logger = createLogger({ level: config.logging.level, pretty: config.isDevelopment });
logConfigSummary(logger, config);

const createProvider = (apiKey: string = config.geoapify.apiKey) =>
    new GeoapifyAdapter({
        apiKey,
        baseUrl: config.geoapify.baseUrl,
        timeoutMs: config.geoapify.timeoutMs,
        logger,
    });

const section = (title: string) => console.log(`\n${'='.repeat(60)}\n${title}\n${'='.repeat(60)}`);

await withLocationClient(createProvider(), async (client) => {
    section('📍 Geocoding');
    const [top] = await client.geocode('Brandenburger Tor, Berlin');
    if (top) {
        console.log(`Address:    ${top.address.formatted}`);
        console.log(`Location:   ${top.coordinate.toString()}`);
        console.log(`Confidence: ${top.confidence ?? 'n/a'} (${top.tier})`);
    } else {
        console.log('No results found');
    }

    section('🏠 Reverse geocoding');
    const addresses = await client.reverseGeocode(new Coordinate(52.5163, 13.3777));
    for (const address of addresses) {
        console.log(`${address.formatted} [${address.city ?? '?'}, ${address.country ?? '?'}]`);
    }

    section('⌨️  Autocomplete');
    const suggestions = await client.autocomplete('Alexanderpl', 3);
    for (const suggestion of suggestions) {
        console.log(`${suggestion.rank}. ${suggestion.label}`);
    }

    section('🧮 Distance matrix (km)');
    const berlin = new Coordinate(52.52, 13.405);
    const munich = new Coordinate(48.1351, 11.582);
    const sources = [berlin, new Coordinate(53.5511, 9.9937)];
    const targets = [munich, new Coordinate(50.1109, 8.6821)];
    const matrix = await client.distanceMatrix(sources, targets, TravelMode.DRIVING, DistanceUnit.KILOMETERS);
    matrix.distancesIn().forEach((row, i) => {
        const cells = row.map((km) => (km === null ? '   n/a' : km.toFixed(1).padStart(6)));
        console.log(`source ${i + 1} | ${cells.join(' | ')}`);
    });

    section('🛣️  Routes by travel mode');
    for (const mode of [TravelMode.DRIVING, TravelMode.WALKING, TravelMode.CYCLING]) {
        try {
            const route = await client.route(berlin, munich, mode);
            console.log(`${mode.padEnd(8)} | ${route.durationMinutes.toFixed(1)} min | ${route.distanceKm.toFixed(2)} km`);
        } catch (error) {
            if (error instanceof NoRouteError) {
                console.log(`${mode.padEnd(8)} | no route`);
            } else {
                throw error;
            }
        }
    }
});

section('🚫 Error handling');
const client = new LocationClient(createProvider('invalid-api-key'));
try {
    await client.geocode('New York, NY');
} catch (error) {
    if (error instanceof AuthenticationError) {
        console.log(`Authentication failed: ${error.message}`);
    } else if (error instanceof RateLimitError) {
        console.log(`Rate limited, retry after ${error.retryAfterSeconds ?? '?'}s`);
    } else if (error instanceof ValidationError) {
        console.log(`Validation error: ${error.issues.join('; ')}`);
    } else if (error instanceof APIError) {
        console.log(`API error (${error.statusCode ?? 'no status'}): ${error.message}`);
    } else {
        throw error;
    }
} finally {
    await client.close();
}

console.log('\n✨ Done!');
