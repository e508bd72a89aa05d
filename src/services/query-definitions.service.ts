import { promises as fs } from 'fs';
import { ConfigLoadError } from '../errors';
import { queryDefinitionCatalogSchema } from '../types/iq.schemas';
import type { QueryDefinitionCatalog } from '../types/iq.types';

// =============================================================================
// Saved View Catalog - view name -> query definition, loaded once per client
// =============================================================================

/**
 * Load the view catalog from a JSON file. A missing file yields an empty
 * catalog; a file that is not a valid catalog fails with ConfigLoadError.
 */
export async function loadQueryDefinitions(filePath: string): Promise<QueryDefinitionCatalog> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf8');
    } catch (error) {
        if (isMissingFile(error)) {
            console.warn(`[QueryDefinitions] ${filePath} not found, no saved views are available`);
            return {};
        }
        throw new ConfigLoadError(filePath, error);
    }

    return parseQueryDefinitions(text, filePath);
}

export function parseQueryDefinitions(text: string, filePath: string): QueryDefinitionCatalog {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        console.error(`[QueryDefinitions] ERROR: ${filePath} is not valid JSON`);
        throw new ConfigLoadError(filePath, error);
    }

    const result = queryDefinitionCatalogSchema.safeParse(parsed);
    if (!result.success) {
        console.error(`[QueryDefinitions] ERROR: ${filePath} is not a map of query definitions`);
        throw new ConfigLoadError(filePath, result.error);
    }

    console.log(`[QueryDefinitions] Loaded ${Object.keys(result.data).length} views from ${filePath}`);
    return result.data;
}

function isMissingFile(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
