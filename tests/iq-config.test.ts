import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    DEFAULT_APPLICATION_NAME,
    DEFAULT_QUERY_DEFINITIONS_FILE,
    DEFAULT_SERVER_PORT,
    loadIqConfig,
    resolveServiceUrl,
} from '../src/config/iq.config';

describe('Client configuration', () => {

    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('falls back to defaults', () => {
        vi.stubEnv('IQ_SERVICE_URL', '');
        vi.stubEnv('IQ_SERVER_HOST', '');
        vi.stubEnv('IQ_SERVER_PORT', '');
        vi.stubEnv('IQ_QUERY_DEFINITIONS_FILE', '');
        vi.stubEnv('IQ_REQUEST_TIMEOUT_MS', '');
        vi.stubEnv('IQ_APPLICATION_NAME', '');
        vi.stubEnv('IQ_VERBOSE', '');

        expect(loadIqConfig()).toEqual({
            serviceUrl: undefined,
            serverHost: undefined,
            serverPort: DEFAULT_SERVER_PORT,
            queryDefinitionsFile: DEFAULT_QUERY_DEFINITIONS_FILE,
            requestTimeoutMs: 0,
            applicationName: DEFAULT_APPLICATION_NAME,
            verbose: false,
        });
    });

    it('reads the environment', () => {
        vi.stubEnv('IQ_SERVER_HOST', '10.0.0.5');
        vi.stubEnv('IQ_SERVER_PORT', '9200');
        vi.stubEnv('IQ_REQUEST_TIMEOUT_MS', '5000');
        vi.stubEnv('IQ_APPLICATION_NAME', 'Landslide');
        vi.stubEnv('IQ_VERBOSE', 'true');

        const config = loadIqConfig();

        expect(config.serverHost).toBe('10.0.0.5');
        expect(config.serverPort).toBe(9200);
        expect(config.requestTimeoutMs).toBe(5000);
        expect(config.applicationName).toBe('Landslide');
        expect(config.verbose).toBe(true);
    });

    it('lets explicit options win, except undefined ones', () => {
        vi.stubEnv('IQ_SERVER_HOST', '10.0.0.5');
        vi.stubEnv('IQ_SERVER_PORT', '9200');

        const config = loadIqConfig({ serverPort: 9300, serverHost: undefined });

        expect(config.serverHost).toBe('10.0.0.5');
        expect(config.serverPort).toBe(9300);
    });

    it('resolves the service URL', () => {
        const base = loadIqConfig();

        expect(resolveServiceUrl({ ...base, serviceUrl: undefined, serverHost: undefined })).toBeNull();
        expect(resolveServiceUrl({ ...base, serviceUrl: undefined, serverHost: 'iq.lab', serverPort: 9199 })).toBe(
            'http://iq.lab:9199'
        );
        expect(resolveServiceUrl({ ...base, serviceUrl: 'https://iq.lab/api//', serverHost: 'ignored' })).toBe(
            'https://iq.lab/api'
        );
    });
});
