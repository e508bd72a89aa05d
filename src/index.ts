/**
 * Client for a test-results database ReST service.
 *
 * Discover the databases produced by test runs, inspect their result and
 * dimension sets, build single or correlated multi-set queries, execute them,
 * and reshape the tabular results into keyed trees or CSV.
 *
 * @example
 * ```typescript
 * import { IqClient, IqMultiQuery } from 'iq-results-client';
 *
 * const client = await IqClient.connect({ serverHost: '10.0.0.5' });
 * const db = await client.setCurrentDb({ name: 'throughput run' });
 *
 * if (db) {
 *   const query = new IqMultiQuery(db, {
 *     setNames: ['tx_stream_stats', 'rx_stream_stats'],
 *     keys: ['stream_stream_id'],
 *   });
 *   query.addTimestampRangeRelative('PT1H');
 *   const raw = await query.execute(true);
 *   const byStream = client.convertResultToDict(raw, ['stream_stream_id']);
 * }
 * ```
 */

// client
export { IqClient } from './services/iq.service';
export type { IqClientOptions, SelectDatabaseOptions } from './services/iq.service';
export { IqTransport } from './services/transport.service';
export type { HttpMethod, TransportOptions } from './services/transport.service';
export { loadIqConfig, resolveServiceUrl, DEFAULT_QUERY_DEFINITIONS_FILE } from './config/iq.config';
export { loadQueryDefinitions, parseQueryDefinitions } from './services/query-definitions.service';

// schema model
export { IqDatabase } from './models/iq-database';
export type { IqDatabaseHost } from './models/iq-database';
export { IqSet, IqResultSet, IqDimensionSet } from './models/iq-set';
export type { ColumnsInfo, SetKind, SetLookup } from './models/iq-set';

// query builder
export { IqQuery, IqSingleQuery, IqMultiQuery } from './models/iq-query';
export type { AnyQuery, MultiExecuteOptions, MultiQueryOptions, TimestampInput } from './models/iq-query';

// result reshaping
export {
    convertResultToDict,
    convertResultToCsv,
    resultToCsv,
    getResultRows,
} from './services/result-converter.service';
export { deepMerge, cloneTree } from './utils/deep-merge';
export type { TreeNode, TreeValue } from './utils/deep-merge';
export { isoFormat, fromIsoFormat } from './utils/timestamp';

// canned results
export { Results } from './results/results';
export { StreamLiveResults } from './results/stream-live-results';

// errors
export {
    IqError,
    ConfigLoadError,
    ColumnNotFoundError,
    SetNotFoundError,
    QueryBuildError,
    KeyArityError,
    KeyNotJoinableError,
    KeyAmbiguousError,
    RemoteServiceError,
    ResponseFormatError,
    MissingDatabaseError,
} from './errors';

export type * from './types/iq.types';
