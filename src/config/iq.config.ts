import path from 'path';
import dotenv from 'dotenv';
import type { IqClientConfig } from '../types/iq.types';

// =============================================================================
// Client Configuration (environment + explicit overrides)
// =============================================================================

export const DEFAULT_SERVER_PORT = 9199;
export const DEFAULT_APPLICATION_NAME = 'TestCenter';

// config/ sits at the package root, two levels above both src/config and dist/config.
export const CONFIG_DIR = path.resolve(__dirname, '..', '..', 'config');
export const DEFAULT_QUERY_DEFINITIONS_FILE = path.join(CONFIG_DIR, 'query-definitions.json');

/**
 * Read client settings from the environment (after loading .env), letting
 * explicit options win.
 */
export function loadIqConfig(overrides: Partial<IqClientConfig> = {}): IqClientConfig {
    dotenv.config();

    const fromEnv: IqClientConfig = {
        serviceUrl: process.env.IQ_SERVICE_URL || undefined,
        serverHost: process.env.IQ_SERVER_HOST || undefined,
        serverPort: parseInt(process.env.IQ_SERVER_PORT || String(DEFAULT_SERVER_PORT), 10),
        queryDefinitionsFile: process.env.IQ_QUERY_DEFINITIONS_FILE || DEFAULT_QUERY_DEFINITIONS_FILE,
        requestTimeoutMs: parseInt(process.env.IQ_REQUEST_TIMEOUT_MS || '0', 10),
        applicationName: process.env.IQ_APPLICATION_NAME || DEFAULT_APPLICATION_NAME,
        verbose: process.env.IQ_VERBOSE === 'true',
    };

    const config: IqClientConfig = { ...fromEnv };
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) {
            Object.assign(config, { [key]: value });
        }
    }

    return config;
}

/**
 * Base URL of the results service from explicit settings, or null when only a
 * live session can tell.
 */
export function resolveServiceUrl(config: IqClientConfig): string | null {
    if (config.serviceUrl) {
        return config.serviceUrl.replace(/\/+$/, '');
    }
    if (config.serverHost) {
        return `http://${config.serverHost}:${config.serverPort}`;
    }
    return null;
}
