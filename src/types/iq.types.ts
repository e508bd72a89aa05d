// =============================================================================
// JSON Values
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

// =============================================================================
// Query Wire Types
// =============================================================================

export interface AbsoluteTimestampRange {
    start?: string;
    end?: string;
}

// Either absolute or relative is set, never both; an empty object means no range.
export interface TimestampRange {
    absolute?: AbsoluteTimestampRange;
    relative?: { interval: string }; // ISO-8601 duration, e.g. "PT1H"
}

export interface QueryBody {
    alias: string | null;
    filters: string[];
    groups: string[];
    orders: string[];
    timestamp_range: TimestampRange;
    limit: number | null;
    pagination: string | null;
    projections: string[];
}

export interface MultiQueryBody extends QueryBody {
    subqueries: QueryBody[];
}

// Hand-written or saved queries (view catalog, literal overrides) may omit fields.
export interface QueryBodyInput {
    alias?: string | null;
    filters?: string[];
    groups?: string[];
    orders?: string[];
    timestamp_range?: TimestampRange;
    limit?: number | null;
    pagination?: string | null;
    projections?: string[];
    subqueries?: QueryBodyInput[];
}

export type QueryDefinition =
    | { single_result: QueryBodyInput }
    | { multi_result: QueryBodyInput };

export type QueryDefinitionCatalog = Record<string, QueryDefinition>;

export interface QueryRequestBody {
    database: { id: string };
    mode: string;
    definition: QueryDefinition;
}

export type SortOrder = 'ASC' | 'DESC';

// Every network-bound call takes these; aborting the signal cancels the request.
export interface RequestOptions {
    signal?: AbortSignal;
}

// =============================================================================
// Result Wire Types
// =============================================================================

// Fields beyond columns and rows (pagination token, mode-specific output) are kept as sent.
export interface QueryResult {
    result: {
        columns: string[];
        rows?: JsonValue[][] | null;
        [field: string]: unknown;
    };
    [field: string]: unknown;
}

// =============================================================================
// Database Catalog Types
// =============================================================================

export interface ColumnInfo {
    name: string;
    type: string;
    unit: string;
    display_name: string;
    description: string;
}

export interface ResultSetInfo {
    name: string;
    facts: ColumnInfo[];
    dimension_sets: string[];
    primary_dimension_set: string | null;
}

export interface DimensionSetInfo {
    name: string;
    attributes: ColumnInfo[];
}

export interface DatabaseSummary {
    id: string;
    name: string;
    first_created: string;
    last_updated: string;
    metadata: Record<string, unknown>;
    [field: string]: unknown;
}

export interface DatabaseInfo extends DatabaseSummary {
    result_sets: ResultSetInfo[];
    dimension_sets: DimensionSetInfo[];
}

// =============================================================================
// Configuration Types
// =============================================================================

export interface IqClientConfig {
    // Full service URL; takes precedence over host/port when set.
    serviceUrl?: string;
    serverHost?: string;
    serverPort: number;
    queryDefinitionsFile: string;
    requestTimeoutMs: number;
    applicationName: string;
    verbose: boolean;
}

export interface SubscribeOptions {
    retentionDuration?: number; // minutes of live data kept in the database
    subscribeType?: string;
    configSubscribeType?: string;
}

// =============================================================================
// Live Test Session
// =============================================================================

/**
 * Handle-based automation API of a running test session. When the client runs
 * inside a live session it asks the session for the results service URL and the
 * database that the current test writes to.
 */
export interface LiveTestSession {
    get(handle: string, attribute: string): Promise<string>;
    create(
        objectType: string,
        under: string,
        attributes: Record<string, string | number | boolean>
    ): Promise<string>;
}
