import { ColumnNotFoundError } from '../errors';
import type { ColumnInfo, DimensionSetInfo, ResultSetInfo } from '../types/iq.types';

// =============================================================================
// Schema Model - result sets and dimension sets
// =============================================================================

export interface ColumnsInfo {
    projections: string[]; // "<full column> AS <alias>"
    columnAliases: string[];
}

export type SetKind = 'result' | 'dimension';

export type SetLookup = (name: string) => IqSet | null;

/**
 * A named tabular entity of a results database with typed columns.
 */
export abstract class IqSet {
    abstract readonly kind: SetKind;
    readonly name: string;
    readonly columnList: string[] = [];
    protected readonly columns = new Map<string, ColumnInfo>();

    protected constructor(name: string, columns: ColumnInfo[]) {
        this.name = name;
        for (const column of columns) {
            if (!this.columns.has(column.name)) {
                this.columnList.push(column.name);
            }
            this.columns.set(column.name, column);
        }
    }

    /**
     * Second pass after every set of the database exists
     */
    resolveRelatedSets(_lookup: SetLookup): void {}

    hasColumn(columnName: string): boolean {
        return this.columns.has(columnName);
    }

    getColumn(columnName: string): ColumnInfo {
        const column = this.columns.get(columnName);
        if (!column) {
            throw new ColumnNotFoundError(columnName, this.name);
        }
        return column;
    }

    getColumnType(columnName: string): string {
        return this.getColumn(columnName).type;
    }

    getColumnUnit(columnName: string): string {
        return this.getColumn(columnName).unit;
    }

    getColumnDisplayName(columnName: string): string {
        return this.getColumn(columnName).display_name;
    }

    getColumnDescription(columnName: string): string {
        return this.getColumn(columnName).description;
    }

    getFullColumnName(columnName: string, _latest = false): string {
        return `${this.name}.${columnName}`;
    }

    getColumnAlias(columnName: string): string {
        return `${this.name}_${columnName}`;
    }

    getColumnsInfo(latest = false): ColumnsInfo {
        const info: ColumnsInfo = { projections: [], columnAliases: [] };
        this.appendColumns(info, latest);
        return info;
    }

    protected appendColumns(info: ColumnsInfo, latest: boolean): void {
        for (const column of this.columnList) {
            const alias = this.getColumnAlias(column);
            info.projections.push(`${this.getFullColumnName(column, latest)} AS ${alias}`);
            info.columnAliases.push(alias);
        }
    }
}

/**
 * Fact table of measured values. Its effective columns are its own facts
 * followed by the attributes of every dimension set it declares.
 */
export class IqResultSet extends IqSet {
    readonly kind = 'result';
    readonly info: ResultSetInfo;
    dimensionSets: IqDimensionSet[] = [];
    primaryDimensionSet: IqDimensionSet | null = null;

    constructor(info: ResultSetInfo) {
        super(info.name, info.facts);
        this.info = info;
    }

    resolveRelatedSets(lookup: SetLookup): void {
        this.dimensionSets = [];
        for (const dimensionSetName of this.info.dimension_sets) {
            const dimensionSet = lookup(dimensionSetName);
            if (dimensionSet instanceof IqDimensionSet) {
                this.dimensionSets.push(dimensionSet);
            } else {
                console.warn(`[IqSet] ${this.name}: dimension set '${dimensionSetName}' is not in the database, skipping`);
            }
        }

        const primary = this.info.primary_dimension_set ? lookup(this.info.primary_dimension_set) : null;
        this.primaryDimensionSet = primary instanceof IqDimensionSet ? primary : null;
    }

    // "$last" keeps only the most recent row of each correlation group.
    getFullColumnName(columnName: string, latest = false): string {
        if (latest) {
            return `(${this.name}$last.${columnName})`;
        }
        return `${this.name}.${columnName}`;
    }

    getColumnsInfo(latest = false): ColumnsInfo {
        const info = super.getColumnsInfo(latest);
        for (const dimensionSet of this.dimensionSets) {
            dimensionSet.appendColumnsTo(info);
        }
        return info;
    }
}

/**
 * Descriptive attributes joinable to result sets.
 */
export class IqDimensionSet extends IqSet {
    readonly kind = 'dimension';
    readonly info: DimensionSetInfo;

    constructor(info: DimensionSetInfo) {
        super(info.name, info.attributes);
        this.info = info;
    }

    appendColumnsTo(info: ColumnsInfo): void {
        this.appendColumns(info, false);
    }
}
