import type { AxiosAdapter } from 'axios';
import type { Dayjs } from 'dayjs';
import type { z } from 'zod';
import { loadIqConfig, resolveServiceUrl } from '../config/iq.config';
import { IqError, MissingDatabaseError, ResponseFormatError } from '../errors';
import { IqDatabase } from '../models/iq-database';
import type { IqDatabaseHost } from '../models/iq-database';
import {
    databaseInfoSchema,
    databaseSummaryListSchema,
    queryResultSchema,
} from '../types/iq.schemas';
import type {
    DatabaseInfo,
    DatabaseSummary,
    IqClientConfig,
    LiveTestSession,
    QueryDefinition,
    QueryDefinitionCatalog,
    QueryRequestBody,
    QueryResult,
    RequestOptions,
    SubscribeOptions,
} from '../types/iq.types';
import { isoFormat, fromIsoFormat, parseServiceTimestamp } from '../utils/timestamp';
import type { TreeNode } from '../utils/deep-merge';
import { loadQueryDefinitions } from './query-definitions.service';
import { convertResultToCsv, convertResultToDict } from './result-converter.service';
import { IqTransport } from './transport.service';

// =============================================================================
// IQ Client - results service, view catalog, database catalog
// =============================================================================

// Automation handles of a live test session.
const SESSION_RESULTS_CONFIG = 'system1.TemevaResultsConfig';
const SESSION_TEST_INFO = 'system1.project.testinfo';
const SESSION_SYSTEM = 'system1';
const RESULTS_SELECTOR_PROFILE = 'spirent.results.EnhancedResultsSelectorProfile';

export interface IqClientOptions extends Partial<IqClientConfig> {
    session?: LiveTestSession | null;
    subscribe?: SubscribeOptions | false;
    adapter?: AxiosAdapter;
}

export interface SelectDatabaseOptions {
    name?: string;
    dbId?: string;
}

export class IqClient implements IqDatabaseHost {
    readonly config: IqClientConfig;
    readonly session: LiveTestSession | null;
    readonly queryDefinitions: QueryDefinitionCatalog;
    dbList: IqDatabase[] = [];
    currentDb: IqDatabase | null = null;
    private readonly transport: IqTransport;

    constructor(
        config: IqClientConfig,
        transport: IqTransport,
        queryDefinitions: QueryDefinitionCatalog = {},
        session: LiveTestSession | null = null
    ) {
        this.config = config;
        this.transport = transport;
        this.queryDefinitions = queryDefinitions;
        this.session = session;
    }

    /**
     * Resolve the service address, load the view catalog, enable results on a
     * live session, discover databases and pick the current one.
     */
    static async connect(options: IqClientOptions = {}): Promise<IqClient> {
        const { session = null, subscribe, adapter, ...overrides } = options;
        const config = loadIqConfig(overrides);

        const baseUrl = resolveServiceUrl(config) ?? (session ? await readSessionServiceUrl(session) : null);
        if (!baseUrl) {
            throw new IqError(
                'No results service address: pass serverHost or serviceUrl, set IQ_SERVER_HOST, or connect from a live test session.'
            );
        }

        const queryDefinitions = await loadQueryDefinitions(config.queryDefinitionsFile);
        const transport = new IqTransport({
            baseUrl,
            timeoutMs: config.requestTimeoutMs,
            verbose: config.verbose,
            adapter,
        });

        const client = new IqClient(config, transport, queryDefinitions, session);
        if (subscribe !== false) {
            await client.subscribe(subscribe ?? {});
        }
        await client.refreshDatabaseList();
        await client.setCurrentDb();

        console.log(`[IqClient] Connected to ${baseUrl}: ${client.dbList.length} databases`);
        return client;
    }

    getResultUrl(): string {
        return this.transport.baseUrl;
    }

    /**
     * Check that the service answers at all
     */
    async testConnection(options: RequestOptions = {}): Promise<boolean> {
        try {
            await this.transport.head('databases', options);
            console.log('[IqClient] Connection test successful');
            return true;
        } catch (error) {
            console.error('[IqClient] Connection test failed:', error);
            return false;
        }
    }

    // =========================================================================
    // Live Session
    // =========================================================================

    /**
     * Make a live session store its results in the database. Without a session
     * there is nothing to do and null comes back.
     */
    async subscribe(options: SubscribeOptions = {}): Promise<string | null> {
        if (!this.session) {
            return null;
        }

        const existing = await this.session.get(SESSION_SYSTEM, `children-${RESULTS_SELECTOR_PROFILE}`);
        if (existing !== '') {
            return existing;
        }

        // With "ALL" every statistic is collected; anything narrower needs group filters.
        const profile = await this.session.create(RESULTS_SELECTOR_PROFILE, SESSION_SYSTEM, {
            SubscribeType: options.subscribeType ?? 'ALL',
            ConfigSubscribeType: options.configSubscribeType ?? 'ALL',
            EnableLiveDataRetention: true,
            LiveDataRetentionInterval: options.retentionDuration ?? 15,
        });
        console.log(`[IqClient] Enabled enhanced results (${profile})`);
        return profile;
    }

    /**
     * Database the live session writes to, or null outside a session
     */
    async getSessionDbId(): Promise<string | null> {
        if (!this.session) {
            return null;
        }

        try {
            const dbId = await this.session.get(SESSION_TEST_INFO, 'ResultDbId');
            return dbId || null;
        } catch (error) {
            console.warn('[IqClient] Could not read the result database id from the session:', error);
            return null;
        }
    }

    // =========================================================================
    // Database Catalog
    // =========================================================================

    async getAllDbInfo(summary: true, options?: RequestOptions): Promise<DatabaseSummary[]>;
    async getAllDbInfo(summary?: false, options?: RequestOptions): Promise<DatabaseInfo[]>;
    async getAllDbInfo(summary = false, options: RequestOptions = {}): Promise<DatabaseSummary[] | DatabaseInfo[]> {
        if (summary) {
            const body = await this.transport.execute('get', 'databases?detail=summary', undefined, options);
            return validate(databaseSummaryListSchema, body, 'database summary list');
        }

        const body = await this.transport.execute('get', 'databases', undefined, options);
        return validate(databaseInfoSchema.array(), body, 'database list');
    }

    async getDbInfo(dbId?: string, summary = true, options: RequestOptions = {}): Promise<DatabaseInfo> {
        const id = dbId || (await this.getSessionDbId());
        if (!id) {
            throw new MissingDatabaseError('getDbInfo');
        }

        const path = `databases/${encodeURIComponent(id)}${summary ? '?detail=summary' : ''}`;
        const body = await this.transport.execute('get', path, undefined, options);
        return validate(databaseInfoSchema, body, `database ${id}`);
    }

    /**
     * Replace the database list with every database this application produced
     */
    async refreshDatabaseList(options: RequestOptions = {}): Promise<IqDatabase[]> {
        const summaries = await this.getAllDbInfo(true, options);

        const dbList: IqDatabase[] = [];
        for (const summary of summaries) {
            if (summary.metadata['application.name'] !== this.config.applicationName) {
                continue;
            }
            dbList.push(await IqDatabase.load(this, summary.id, options));
        }

        this.dbList = dbList;
        if (this.currentDb) {
            this.currentDb = this.findDbById(this.currentDb.id);
        }

        console.log(`[IqClient] Found ${dbList.length} of ${summaries.length} databases for ${this.config.applicationName}`);
        return this.dbList;
    }

    /**
     * Select by id, else by name, else whatever the live session is writing to
     */
    async setCurrentDb(options: SelectDatabaseOptions = {}): Promise<IqDatabase | null> {
        if (options.dbId) {
            this.currentDb = this.findDbById(options.dbId);
        } else if (options.name) {
            this.currentDb = this.findDbByName(options.name);
        } else {
            const sessionDbId = await this.getSessionDbId();
            this.currentDb = sessionDbId ? this.findDbById(sessionDbId) : null;
        }
        return this.currentDb;
    }

    findDbById(id: string): IqDatabase | null {
        return this.dbList.find((db) => db.id === id) ?? null;
    }

    /**
     * Most recently updated database with this name. When the timestamps do not
     * tell two databases apart, the later one in the list wins.
     */
    findDbByName(name: string): IqDatabase | null {
        let currentDb: IqDatabase | null = null;
        let currentTimestamp: Dayjs | null = null;

        for (const db of this.dbList) {
            if (db.name !== name) {
                continue;
            }

            const timestamp = parseServiceTimestamp(db.lastUpdated);
            if (!currentDb || !currentTimestamp || !timestamp || !timestamp.isBefore(currentTimestamp)) {
                currentDb = db;
                currentTimestamp = timestamp;
            }
        }

        return currentDb;
    }

    // =========================================================================
    // Queries
    // =========================================================================

    /**
     * Run a query definition, e.g. one copied from the UI's "View Query", against
     * a database (the current one unless given). The response body comes back as
     * the service sent it, extra fields included.
     */
    async executeQuery(
        definition: QueryDefinition,
        mode = 'once',
        dbId?: string,
        options: RequestOptions = {}
    ): Promise<QueryResult> {
        const id = dbId || this.currentDb?.id || (await this.getSessionDbId());
        if (!id) {
            throw new MissingDatabaseError('executeQuery');
        }

        const request: QueryRequestBody = {
            database: { id },
            mode,
            definition,
        };

        const body = await this.transport.execute('post', 'queries', request, options);
        const result = validate(queryResultSchema, body, 'query result');

        if (this.config.verbose) {
            console.log(`[IqClient] Query on ${id} returned ${result.result.rows?.length ?? 0} rows`);
        }
        return result;
    }

    /**
     * Run a saved view by name. An unknown name lists the available views and
     * yields null.
     */
    async executeViewQuery(viewName: string, dbId?: string, options: RequestOptions = {}): Promise<QueryResult | null> {
        if (!Object.prototype.hasOwnProperty.call(this.queryDefinitions, viewName)) {
            console.error(
                `[IqClient] ERROR: The view '${viewName}' is not defined. Please use one of the following views:`
            );
            for (const view of this.getViewNames()) {
                console.error(`  ${view}`);
            }
            return null;
        }

        return this.executeQuery(this.queryDefinitions[viewName], 'once', dbId, options);
    }

    getViewNames(): string[] {
        return Object.keys(this.queryDefinitions);
    }

    // =========================================================================
    // Result Helpers
    // =========================================================================

    convertResultToDict(raw: QueryResult, keyNames: string[] = []): TreeNode {
        return convertResultToDict(raw, keyNames);
    }

    async convertResultToCsv(raw: QueryResult, filename = 'results.csv'): Promise<void> {
        await convertResultToCsv(raw, filename);
    }

    isoFormat(timestamp: Date | Dayjs): string {
        return isoFormat(timestamp);
    }

    fromIsoFormat(timestamp: string): Date {
        return fromIsoFormat(timestamp);
    }
}

async function readSessionServiceUrl(session: LiveTestSession): Promise<string | null> {
    const url = await session.get(SESSION_RESULTS_CONFIG, 'ServiceUrl');
    return url ? url.replace(/\/+$/, '') : null;
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
        throw new ResponseFormatError(`Unexpected ${what} from the results service: ${result.error.message}`, result.error);
    }
    return result.data;
}
