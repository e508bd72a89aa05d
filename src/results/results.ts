import type { IqDatabase } from '../models/iq-database';
import type { AnyQuery } from '../models/iq-query';
import type { QueryResult, RequestOptions } from '../types/iq.types';

// =============================================================================
// Canned Results - a fixed query plus fixed post-processing
// =============================================================================

/**
 * Build (or override) a query, execute it, reshape the rows.
 */
export abstract class Results<TData> {
    readonly db: IqDatabase;
    abstract readonly query: AnyQuery;
    keys: string[] = [];
    rawResultData: QueryResult | null = null;
    resultData: TData | null = null;
    // Column names of the last result.
    counters: string[] | null = null;

    protected constructor(db: IqDatabase) {
        this.db = db;
    }

    async refresh(latest = true, options: RequestOptions = {}): Promise<TData> {
        const startTime = Date.now();

        const raw = await this.runQuery(latest, options);
        this.rawResultData = raw;
        this.counters = [...raw.result.columns];
        this.resultData = this.reshape(raw);

        console.log(
            `[${this.constructor.name}] Refreshed ${raw.result.rows?.length ?? 0} rows in ${Date.now() - startTime}ms`
        );
        return this.resultData;
    }

    protected runQuery(latest: boolean, options: RequestOptions): Promise<QueryResult> {
        return this.query.execute(latest, options);
    }

    protected abstract reshape(raw: QueryResult): TData;
}
