import type { DatabaseInfo, DatabaseSummary, QueryDefinition, QueryResult } from '../../src/types/iq.types';
import type { IqDatabaseHost } from '../../src/models/iq-database';

// =============================================================================
// Test Data
// =============================================================================

export function column(name: string, type = 'uint64', unit = '') {
    return {
        name,
        type,
        unit,
        display_name: name.replace(/_/g, ' '),
        description: `${name} column`,
    };
}

/**
 * Two stream result sets sharing the "stream" dimension set. Result sets come
 * first, so every dimension-set reference points forward.
 */
export function streamDatabaseInfo(overrides: Partial<DatabaseInfo> = {}): DatabaseInfo {
    return {
        id: 'db-stream-1',
        name: 'throughput run',
        first_created: '2024-03-01T10:00:00.000000Z',
        last_updated: '2024-03-01T10:30:00.000000Z',
        metadata: {
            'application.name': 'TestCenter',
            'test.running': 'true',
        },
        result_sets: [
            {
                name: 'tx_stream_stats',
                facts: [column('timestamp', 'timestamp'), column('frame_count')],
                dimension_sets: ['stream', 'tx_port'],
                primary_dimension_set: 'stream',
            },
            {
                name: 'rx_stream_stats',
                facts: [column('timestamp', 'timestamp'), column('frame_count'), column('avg_latency', 'double', 'us')],
                dimension_sets: ['stream', 'rx_port'],
                primary_dimension_set: 'stream',
            },
            {
                name: 'tx_stream_live_stats',
                facts: [column('timestamp', 'timestamp'), column('frame_rate')],
                dimension_sets: ['tx_stream'],
                primary_dimension_set: 'tx_stream',
            },
            {
                name: 'rx_stream_live_stats',
                facts: [column('timestamp', 'timestamp'), column('sig_frame_rate')],
                dimension_sets: ['rx_stream'],
                primary_dimension_set: 'rx_stream',
            },
        ],
        dimension_sets: [
            { name: 'stream', attributes: [column('stream_id', 'string')] },
            { name: 'tx_port', attributes: [column('name', 'string')] },
            { name: 'rx_port', attributes: [column('name', 'string')] },
            { name: 'tx_stream', attributes: [column('stream_id', 'string')] },
            { name: 'rx_stream', attributes: [column('stream_id', 'string')] },
        ],
        ...overrides,
    };
}

export function summaryOf(info: DatabaseInfo): DatabaseSummary {
    return {
        id: info.id,
        name: info.name,
        first_created: info.first_created,
        last_updated: info.last_updated,
        metadata: info.metadata,
    };
}

export function tableResult(columns: string[], rows: QueryResult['result']['rows']): QueryResult {
    return { result: { columns, rows } };
}

export interface StubHost extends IqDatabaseHost {
    executed: Array<{ definition: QueryDefinition; mode?: string; dbId?: string }>;
}

/**
 * Minimal database owner: serves one database and answers every query with `result`
 */
export function stubHost(info: DatabaseInfo, result: QueryResult = tableResult([], [])): StubHost {
    const executed: StubHost['executed'] = [];
    return {
        executed,
        getResultUrl: () => 'http://iq.test:9199',
        getDbInfo: async () => info,
        executeQuery: async (definition, mode, dbId) => {
            executed.push({ definition, mode, dbId });
            return result;
        },
    };
}
