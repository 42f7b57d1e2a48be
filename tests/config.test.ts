import { readConfig } from '../src/config.js';

describe('readConfig', () => {
    test('falls back to defaults', () => {
        expect(readConfig({})).toEqual({
            baseUrl: 'https://www.ebi.ac.uk/QuickGO/services',
            timeoutMs: 30000,
            concurrency: 4,
        });
    });

    test('reads overrides from the environment', () => {
        expect(readConfig({
            QUICKGO_BASE_URL: 'http://localhost:8080/services',
            GO_ANNOTATE_TIMEOUT_MS: '5000',
            GO_ANNOTATE_CONCURRENCY: '8',
        })).toEqual({
            baseUrl: 'http://localhost:8080/services',
            timeoutMs: 5000,
            concurrency: 8,
        });
    });

    test('rejects invalid values', () => {
        expect(() => readConfig({ GO_ANNOTATE_CONCURRENCY: '0' })).toThrow(
            'Invalid environment variable GO_ANNOTATE_CONCURRENCY'
        );
        expect(() => readConfig({ QUICKGO_BASE_URL: 'not a url' })).toThrow(
            'Invalid environment variable QUICKGO_BASE_URL'
        );
    });
});
