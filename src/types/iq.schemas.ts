import { z } from 'zod';
import type {
    ColumnInfo,
    DatabaseInfo,
    DatabaseSummary,
    DimensionSetInfo,
    JsonValue,
    QueryBodyInput,
    QueryDefinition,
    QueryDefinitionCatalog,
    QueryResult,
    ResultSetInfo,
    TimestampRange,
} from './iq.types';

// =============================================================================
// Payload Schemas - everything that enters the client from the wire or disk
// =============================================================================

const optionalText = z
    .string()
    .nullish()
    .transform((value) => value ?? '');

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(jsonValueSchema),
        z.record(jsonValueSchema),
    ])
);

export const timestampRangeSchema: z.ZodType<TimestampRange> = z.object({
    absolute: z
        .object({
            start: z.string().optional(),
            end: z.string().optional(),
        })
        .optional(),
    relative: z.object({ interval: z.string() }).optional(),
});

export const queryBodyInputSchema: z.ZodType<QueryBodyInput> = z.lazy(() =>
    z
        .object({
            alias: z.string().nullish(),
            filters: z.array(z.string()).optional(),
            groups: z.array(z.string()).optional(),
            orders: z.array(z.string()).optional(),
            timestamp_range: timestampRangeSchema.optional(),
            limit: z.number().int().nullish(),
            pagination: z.string().nullish(),
            projections: z.array(z.string()).optional(),
            subqueries: z.array(queryBodyInputSchema).optional(),
        })
        .passthrough()
);

export const queryDefinitionSchema: z.ZodType<QueryDefinition> = z.union([
    z.object({ single_result: queryBodyInputSchema }),
    z.object({ multi_result: queryBodyInputSchema }),
]);

export const queryDefinitionCatalogSchema: z.ZodType<QueryDefinitionCatalog> = z.record(
    queryDefinitionSchema
);

// Only the tabular core is checked; every other field passes through untouched.
export const queryResultSchema: z.ZodType<QueryResult> = z
    .object({
        result: z
            .object({
                columns: z.array(z.string()),
                rows: z.array(z.array(jsonValueSchema)).nullish(),
            })
            .passthrough(),
    })
    .passthrough();

export const columnInfoSchema: z.ZodType<ColumnInfo, z.ZodTypeDef, unknown> = z.object({
    name: z.string(),
    type: z.string(),
    unit: optionalText,
    display_name: optionalText,
    description: optionalText,
});

export const resultSetInfoSchema: z.ZodType<ResultSetInfo, z.ZodTypeDef, unknown> = z.object({
    name: z.string(),
    facts: z.array(columnInfoSchema).default([]),
    dimension_sets: z.array(z.string()).default([]),
    primary_dimension_set: z.string().nullish().transform((value) => value ?? null),
});

export const dimensionSetInfoSchema: z.ZodType<DimensionSetInfo, z.ZodTypeDef, unknown> = z.object({
    name: z.string(),
    attributes: z.array(columnInfoSchema).default([]),
});

const databaseSummaryShape = {
    id: z.string(),
    name: z.string(),
    first_created: optionalText,
    last_updated: optionalText,
    metadata: z
        .record(z.unknown())
        .nullish()
        .transform((value) => value ?? {}),
};

export const databaseSummarySchema: z.ZodType<DatabaseSummary, z.ZodTypeDef, unknown> = z
    .object(databaseSummaryShape)
    .passthrough();

export const databaseSummaryListSchema = z.array(databaseSummarySchema);

export const databaseInfoSchema: z.ZodType<DatabaseInfo, z.ZodTypeDef, unknown> = z
    .object({
        ...databaseSummaryShape,
        result_sets: z.array(resultSetInfoSchema).nullish().transform((value) => value ?? []),
        dimension_sets: z.array(dimensionSetInfoSchema).nullish().transform((value) => value ?? []),
    })
    .passthrough();
