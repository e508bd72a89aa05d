import { promises as fs } from 'fs';
import { ColumnNotFoundError } from '../errors';
import { deepMerge, setTreeChild } from '../utils/deep-merge';
import type { TreeNode, TreeValue } from '../utils/deep-merge';
import type { JsonValue, QueryResult } from '../types/iq.types';

// =============================================================================
// Result Reshaping - tabular results into keyed trees or CSV
// =============================================================================

export function getResultRows(raw: QueryResult): JsonValue[][] {
    return raw.result.rows ?? [];
}

/**
 * Turn a tabular result into a keyed tree.
 *
 * Without key names each row is stored under its 1-based row number. With key
 * names the tree nests one level per key, keyed by that column's value, and the
 * last level holds the row itself; rows that share key values are deep-merged.
 *
 * Key values become property names: strings as they are, anything else as its
 * JSON text. The number 1 and the string "1" therefore land under the same key
 * and their rows are merged.
 */
export function convertResultToDict(raw: QueryResult, keyNames: string[] = []): TreeNode {
    const columns = raw.result.columns;
    for (const key of keyNames) {
        if (!columns.includes(key)) {
            throw new ColumnNotFoundError(key);
        }
    }

    const resultDict: TreeNode = {};
    getResultRows(raw).forEach((row, rowIndex) => {
        const entry: TreeNode = {};
        columns.forEach((column, columnIndex) => {
            setTreeChild(entry, column, row[columnIndex] ?? null);
        });

        if (keyNames.length === 0) {
            setTreeChild(resultDict, String(rowIndex + 1), entry);
            return;
        }

        let nested: TreeNode = entry;
        for (let index = keyNames.length - 1; index >= 0; index--) {
            const parent: TreeNode = {};
            setTreeChild(parent, toKey(ownValue(entry, keyNames[index])), nested);
            nested = parent;
        }
        deepMerge(resultDict, nested);
    });

    return resultDict;
}

/**
 * Render a result as CSV: header line first, then one line per row.
 *
 * Lines end with "\n" (not "\r\n") and booleans are written as `true`/`false`,
 * so files differ byte-wise from ones written by spreadsheet-style CSV writers.
 */
export function resultToCsv(raw: QueryResult): string {
    const table: JsonValue[][] = [raw.result.columns, ...getResultRows(raw)];
    const lines = table.map((fields) => fields.map(formatCsvField).join(','));
    return `${lines.join('\n')}\n`;
}

export async function convertResultToCsv(raw: QueryResult, filename = 'results.csv'): Promise<void> {
    await fs.writeFile(filename, resultToCsv(raw), 'utf8');
    console.log(`[ResultConverter] Wrote ${getResultRows(raw).length} rows to ${filename}`);
}

function ownValue(node: TreeNode, key: string): TreeValue | undefined {
    return Object.prototype.hasOwnProperty.call(node, key) ? node[key] : undefined;
}

function toKey(value: TreeValue | undefined): string {
    if (typeof value === 'string') {
        return value;
    }
    return JSON.stringify(value ?? null);
}

// Quote only when the field holds the delimiter, a quote or a line break.
function formatCsvField(value: JsonValue | undefined): string {
    if (value === null || value === undefined) {
        return '';
    }
    const text = typeof value === 'object' ? JSON.stringify(value) : String(value);
    if (/[",\r\n]/.test(text)) {
        return `"${text.replace(/"/g, '""')}"`;
    }
    return text;
}
