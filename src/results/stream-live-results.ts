import { IqMultiQuery } from '../models/iq-query';
import type { IqDatabase } from '../models/iq-database';
import { convertResultToDict } from '../services/result-converter.service';
import type { QueryResult, RequestOptions } from '../types/iq.types';
import type { TreeNode } from '../utils/deep-merge';
import { loadCannedQuery } from './canned-query';
import { Results } from './results';

export const STREAM_LIVE_QUERY_FILE = 'stream-live-query.json';

/**
 * Latest transmit and receive live statistics per stream, keyed by stream id
 * and then by sample timestamp.
 */
export class StreamLiveResults extends Results<TreeNode> {
    readonly query: IqMultiQuery;

    constructor(db: IqDatabase) {
        super(db);
        this.keys = ['tx_stream_stream_id'];
        this.query = new IqMultiQuery(db, {
            setNames: ['tx_stream_live_stats', 'rx_stream_live_stats'],
            keys: this.keys,
        });
    }

    // Transmit and receive sides expose the stream id under different aliases, so
    // the join is written out in a literal query rather than built from the keys.
    protected async runQuery(latest: boolean, options: RequestOptions): Promise<QueryResult> {
        const customQuery = await loadCannedQuery(STREAM_LIVE_QUERY_FILE);
        return this.query.execute(latest, { ...options, customQuery });
    }

    protected reshape(raw: QueryResult): TreeNode {
        return convertResultToDict(raw, [...this.keys, 'tx_stream_live_stats_timestamp']);
    }
}
