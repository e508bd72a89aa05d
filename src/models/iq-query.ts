import type { Dayjs } from 'dayjs';
import { KeyAmbiguousError, KeyNotJoinableError, QueryBuildError, SetNotFoundError } from '../errors';
import { isoFormat } from '../utils/timestamp';
import type { IqDatabase } from './iq-database';
import type { ColumnsInfo, IqSet } from './iq-set';
import type {
    AbsoluteTimestampRange,
    MultiQueryBody,
    QueryBody,
    QueryBodyInput,
    QueryDefinition,
    QueryResult,
    RequestOptions,
    TimestampRange,
} from '../types/iq.types';

// =============================================================================
// Query Builder - single and multi (correlated) result queries
// =============================================================================

export type TimestampInput = string | Date | Dayjs;

export type AnyQuery = IqSingleQuery | IqMultiQuery;

/**
 * State shared by every query: alias, filter/group/order expressions, time
 * range, limit and pagination token.
 */
export abstract class IqQuery {
    abstract readonly kind: 'single' | 'multi';
    readonly db: IqDatabase;
    name: string | null;

    filters: string[] = [];
    groups: string[] = [];
    orders: string[] = [];
    timestampRange: TimestampRange = {};
    limit: number | null = null;
    pagination: string | null = null;

    protected constructor(db: IqDatabase, name: string | null = null) {
        this.db = db;
        this.name = name;
    }

    /** column aliases this query exposes to an enclosing multi-query */
    abstract getColumns(): string[];

    abstract getQuery(latest?: boolean): QueryBody;

    abstract toDefinition(latest?: boolean): QueryDefinition;

    async execute(latest = false, options: RequestOptions = {}): Promise<QueryResult> {
        return this.db.client.executeQuery(this.toDefinition(latest), 'once', this.db.id, options);
    }

    addFilter(filter: string): void {
        this.filters.push(filter);
    }

    deleteFilters(): void {
        this.filters = [];
    }

    addGroup(group: string): void {
        this.groups.push(group);
    }

    deleteGroups(): void {
        this.groups = [];
    }

    addOrder(order: string): void {
        this.orders.push(order);
    }

    deleteOrders(): void {
        this.orders = [];
    }

    /**
     * Replace the time range with a raw range, or clear it
     */
    setTimestampRange(range: TimestampRange | null = null): void {
        this.timestampRange = range ? { ...range } : {};
    }

    /**
     * Restrict to an absolute window; either end may be left open
     */
    addTimestampRangeAbsolute(start?: TimestampInput | null, end?: TimestampInput | null): void {
        this.timestampRange = {};
        if (!start && !end) {
            return;
        }

        const absolute: AbsoluteTimestampRange = {};
        if (start) {
            absolute.start = typeof start === 'string' ? start : isoFormat(start);
        }
        if (end) {
            absolute.end = typeof end === 'string' ? end : isoFormat(end);
        }
        this.timestampRange = { absolute };
    }

    /**
     * Restrict to the trailing interval, an ISO-8601 duration such as "PT1M" or "PT1H"
     */
    addTimestampRangeRelative(interval?: string | null): void {
        this.timestampRange = {};
        if (interval) {
            this.timestampRange = { relative: { interval } };
        }
    }

    setLimit(limit: number | null): void {
        this.limit = limit;
    }

    setPagination(pagination: string | null): void {
        this.pagination = pagination;
    }

    protected getBaseQuery(): Omit<QueryBody, 'projections'> {
        return {
            alias: this.name,
            filters: [...this.filters],
            groups: [...this.groups],
            orders: [...this.orders],
            timestamp_range: cloneTimestampRange(this.timestampRange),
            limit: this.limit,
            pagination: this.pagination,
        };
    }
}

// =============================================================================
// Single Result Query
// =============================================================================

export class IqSingleQuery extends IqQuery {
    readonly kind = 'single';
    readonly set: IqSet;
    columnsInfo: ColumnsInfo;

    /**
     * @param setName - set to project; also the alias unless `name` is given
     */
    constructor(db: IqDatabase, setName: string, name?: string | null) {
        super(db, name ?? setName);

        const set = db.findSetByName(setName);
        if (!set) {
            throw new SetNotFoundError(setName, db.id);
        }
        this.set = set;
        this.columnsInfo = set.getColumnsInfo(false);
    }

    getColumns(): string[] {
        return this.columnsInfo.columnAliases;
    }

    refreshColumnsInfo(latest = false): void {
        this.columnsInfo = this.set.getColumnsInfo(latest);
    }

    getQuery(latest = false): QueryBody {
        this.refreshColumnsInfo(latest);

        return {
            ...this.getBaseQuery(),
            projections: [...this.columnsInfo.projections],
        };
    }

    toDefinition(latest = false): QueryDefinition {
        return { single_result: this.getQuery(latest) };
    }
}

// =============================================================================
// Multi Result Query
// =============================================================================

export interface MultiExecuteOptions extends RequestOptions {
    customQuery?: QueryBodyInput | null; // literal body sent instead of the built one
}

export interface MultiQueryOptions {
    setNames?: string[]; // each becomes a single-result sub-query
    subqueries?: AnyQuery[];
    name?: string | null;
    keys?: string[]; // column aliases that correlate two sub-queries
}

/**
 * Two or more sub-queries (single or multi, in any mix) correlated on key
 * columns. Every key must be exposed by exactly two sub-queries; the built
 * query joins them with an equality filter.
 */
export class IqMultiQuery extends IqQuery {
    readonly kind = 'multi';
    subqueries: AnyQuery[] = [];
    keys: string[];

    constructor(db: IqDatabase, options: MultiQueryOptions = {}) {
        super(db, options.name ?? null);

        for (const setName of options.setNames ?? []) {
            this.subqueries.push(new IqSingleQuery(db, setName));
        }
        if (options.subqueries) {
            this.addSubqueries(options.subqueries);
        }

        this.keys = [...(options.keys ?? [])];
    }

    addSubqueries(queries: AnyQuery[]): void {
        this.subqueries.push(...queries);
    }

    getColumns(): string[] {
        return this.subqueries.flatMap((query) => query.getColumns());
    }

    getQuery(latest = false): MultiQueryBody {
        const subqueries: QueryBody[] = [];
        const projections: string[] = [];
        const projected = new Set<string>();
        const keys = new Set(this.keys);
        const keyReferences = new Map<string, string[]>();

        for (const subquery of this.subqueries) {
            subqueries.push(subquery.getQuery(latest));

            if (!subquery.name) {
                throw new QueryBuildError('Every sub-query of a multi-query needs an alias.');
            }

            for (const column of subquery.getColumns()) {
                const fullColumn = `${subquery.name}.${column}`;

                if (!projected.has(column)) {
                    projected.add(column);
                    projections.push(`${fullColumn} AS ${column}`);
                }

                if (keys.has(column)) {
                    const references = keyReferences.get(column) ?? [];
                    references.push(fullColumn);
                    keyReferences.set(column, references);
                }
            }
        }

        const filters = [...this.filters];
        for (const [key, references] of keyReferences) {
            if (references.length < 2) {
                throw new KeyNotJoinableError(key, references);
            }
            if (references.length > 2) {
                throw new KeyAmbiguousError(key, references);
            }
            filters.push(`${references[0]}=${references[1]}`);
        }
        for (const key of keys) {
            if (!keyReferences.has(key)) {
                throw new KeyNotJoinableError(key, []);
            }
        }

        return {
            ...this.getBaseQuery(),
            filters,
            subqueries,
            projections,
        };
    }

    toDefinition(latest = false): QueryDefinition {
        return { multi_result: this.getQuery(latest) };
    }

    /**
     * Run the built query, or a literal query body in its place
     */
    async execute(latest = false, options: MultiExecuteOptions = {}): Promise<QueryResult> {
        const { customQuery, ...requestOptions } = options;
        const definition: QueryDefinition = customQuery
            ? { multi_result: customQuery }
            : this.toDefinition(latest);
        return this.db.client.executeQuery(definition, 'once', this.db.id, requestOptions);
    }
}

function cloneTimestampRange(range: TimestampRange): TimestampRange {
    const copy: TimestampRange = {};
    if (range.absolute) {
        copy.absolute = { ...range.absolute };
    }
    if (range.relative) {
        copy.relative = { ...range.relative };
    }
    return copy;
}
