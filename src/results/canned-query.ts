import path from 'path';
import { promises as fs } from 'fs';
import { CONFIG_DIR } from '../config/iq.config';
import { ConfigLoadError } from '../errors';
import { queryBodyInputSchema } from '../types/iq.schemas';
import type { QueryBodyInput } from '../types/iq.types';

const cannedQueries = new Map<string, QueryBodyInput>();

/**
 * Literal query body shipped under config/, read once and reused
 */
export async function loadCannedQuery(fileName: string): Promise<QueryBodyInput> {
    const cached = cannedQueries.get(fileName);
    if (cached) {
        return cached;
    }

    const filePath = path.join(CONFIG_DIR, fileName);
    let parsed: unknown;
    try {
        parsed = JSON.parse(await fs.readFile(filePath, 'utf8'));
    } catch (error) {
        throw new ConfigLoadError(filePath, error);
    }

    const result = queryBodyInputSchema.safeParse(parsed);
    if (!result.success) {
        throw new ConfigLoadError(filePath, result.error);
    }

    cannedQueries.set(fileName, result.data);
    return result.data;
}
