import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';
import { ConfigLoadError } from '../src/errors';
import { DEFAULT_QUERY_DEFINITIONS_FILE } from '../src/config/iq.config';
import { loadQueryDefinitions, parseQueryDefinitions } from '../src/services/query-definitions.service';

describe('Saved view catalog', () => {
    let dir: string;

    async function writeCatalog(name: string, text: string): Promise<string> {
        const filePath = path.join(dir, name);
        await fs.writeFile(filePath, text, 'utf8');
        return filePath;
    }

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'iq-views-'));
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('loads a map of view names to query definitions', async () => {
        const catalog = {
            tx_frames: { single_result: { alias: 'tx', projections: ['tx_stream_stats.frame_count AS frames'] } },
            joined: { multi_result: { projections: [], subqueries: [{ alias: 'a', projections: [] }] } },
        };
        const filePath = await writeCatalog('views.json', JSON.stringify(catalog));

        await expect(loadQueryDefinitions(filePath)).resolves.toEqual(catalog);
        expect(console.log).toHaveBeenCalledWith(`[QueryDefinitions] Loaded 2 views from ${filePath}`);
    });

    it('keeps query fields it does not know about', () => {
        const text = JSON.stringify({ view: { single_result: { projections: [], distinct: true } } });

        expect(parseQueryDefinitions(text, 'inline.json')).toEqual({
            view: { single_result: { projections: [], distinct: true } },
        });
    });

    it('yields an empty catalog when the file is missing', async () => {
        const filePath = path.join(dir, 'absent.json');

        await expect(loadQueryDefinitions(filePath)).resolves.toEqual({});
        expect(console.warn).toHaveBeenCalledWith(`[QueryDefinitions] ${filePath} not found, no saved views are available`);
    });

    it('rejects a file that is not JSON', async () => {
        const filePath = await writeCatalog('broken.json', '{ "view": ');

        const error = await loadQueryDefinitions(filePath).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(ConfigLoadError);
        if (error instanceof ConfigLoadError) {
            expect(error.filePath).toBe(filePath);
            expect(error.message.startsWith(`Unexpected error while parsing the JSON definition file '${filePath}': `)).toBe(true);
            expect(error.cause).toBeInstanceOf(SyntaxError);
        }
    });

    it('rejects definitions that are neither single nor multi result', async () => {
        const filePath = await writeCatalog('shape.json', JSON.stringify({ view: { chart_result: {} } }));

        await expect(loadQueryDefinitions(filePath)).rejects.toThrow(ConfigLoadError);
    });

    it('rejects a catalog that is not an object of definitions', () => {
        expect(() => parseQueryDefinitions('[1, 2]', 'list.json')).toThrow(ConfigLoadError);
        expect(() => parseQueryDefinitions('{"view": {"single_result": {"limit": "ten"}}}', 'limit.json')).toThrow(
            ConfigLoadError
        );
    });

    it('wraps other read failures', async () => {
        await expect(loadQueryDefinitions(dir)).rejects.toThrow(ConfigLoadError);
    });

    it('ships a bundled catalog', async () => {
        const catalog = await loadQueryDefinitions(DEFAULT_QUERY_DEFINITIONS_FILE);

        expect(Object.keys(catalog)).toEqual(['port_traffic_summary', 'stream_latency_last_hour', 'test_events']);
        expect(catalog.stream_latency_last_hour).toMatchObject({
            single_result: { timestamp_range: { relative: { interval: 'PT1H' } }, limit: 500 },
        });
        expect('multi_result' in catalog.test_events).toBe(true);
    });
});
