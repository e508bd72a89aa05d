import { IqDimensionSet, IqResultSet } from './iq-set';
import type { IqSet } from './iq-set';
import type { DatabaseInfo, QueryDefinition, QueryResult, RequestOptions, SortOrder } from '../types/iq.types';

// =============================================================================
// Results Database
// =============================================================================

/**
 * What a database needs from the client that owns it.
 */
export interface IqDatabaseHost {
    getResultUrl(): string;
    getDbInfo(dbId?: string, summary?: boolean, options?: RequestOptions): Promise<DatabaseInfo>;
    executeQuery(
        definition: QueryDefinition,
        mode?: string,
        dbId?: string,
        options?: RequestOptions
    ): Promise<QueryResult>;
}

export class IqDatabase {
    readonly client: IqDatabaseHost;
    readonly id: string;
    name = '';
    firstCreated = '';
    lastUpdated = '';
    running = false;
    info: DatabaseInfo | null = null;

    resultSetList: IqResultSet[] = [];
    dimensionSetList: IqDimensionSet[] = [];
    setList: IqSet[] = [];

    // Profile the UI opens the database with; only used by getDbUrl().
    profileId: string | null = null;

    constructor(client: IqDatabaseHost, id: string) {
        this.client = client;
        this.id = id;
    }

    /**
     * Create a database handle and load its schema
     */
    static async load(client: IqDatabaseHost, id: string, options: RequestOptions = {}): Promise<IqDatabase> {
        const db = new IqDatabase(client, id);
        await db.refresh(options);
        return db;
    }

    /**
     * Reload the database information and rebuild every set
     */
    async refresh(options: RequestOptions = {}): Promise<void> {
        const info = await this.client.getDbInfo(this.id, false, options);

        this.info = info;
        this.name = info.name;
        this.firstCreated = info.first_created;
        this.lastUpdated = info.last_updated;
        this.running = String(info.metadata['test.running'] ?? 'false').toLowerCase() === 'true';

        this.refreshSetList();
    }

    refreshSetList(): void {
        const info = this.info;
        if (!info) {
            this.resultSetList = [];
            this.dimensionSetList = [];
            this.setList = [];
            return;
        }

        this.resultSetList = info.result_sets.map((setInfo) => new IqResultSet(setInfo));
        this.dimensionSetList = info.dimension_sets.map((setInfo) => new IqDimensionSet(setInfo));
        this.setList = [...this.resultSetList, ...this.dimensionSetList];

        // Result sets name dimension sets that may be declared after them.
        const lookup = (name: string) => this.findSetByName(name);
        for (const set of this.setList) {
            set.resolveRelatedSets(lookup);
        }
    }

    findSetByName(name: string): IqSet | null {
        return this.setList.find((set) => set.name === name) ?? null;
    }

    /**
     * Names of every snapshot saved in this database, ordered by event time
     */
    async getSnapshotList(order: SortOrder = 'ASC', options: RequestOptions = {}): Promise<string[]> {
        const definition: QueryDefinition = {
            multi_result: {
                filters: [],
                groups: [],
                orders: [`view.test_event_timestamp ${order}`],
                projections: [
                    'view.test_snapshot_name as snapshot_name',
                    'view.test_snapshot_number as snapshot_number',
                ],
                subqueries: [
                    {
                        alias: 'view',
                        filters: ["test_events.name = 'snapshot_completed'"],
                        groups: [],
                        orders: [],
                        projections: [
                            'test.snapshot_name as test_snapshot_name',
                            'test.snapshot_number as test_snapshot_number',
                            'test_events.name as test_event_name',
                            'test_events.timestamp as test_event_timestamp',
                        ],
                    },
                ],
            },
        };

        const result = await this.client.executeQuery(definition, 'once', this.id, options);
        return (result.result.rows ?? []).map((row) => String(row[0] ?? ''));
    }

    getDbUrl(): string {
        let url = `${this.client.getResultUrl()}/results/${this.id}`;
        if (this.profileId) {
            url += `?profileId=${this.profileId}`;
        }
        return url;
    }

    setProfileId(profileId: string | null): void {
        this.profileId = profileId;
    }
}
