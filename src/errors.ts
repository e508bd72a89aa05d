// =============================================================================
// Error Types
// =============================================================================

export class IqError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'IqError';
    }
}

/**
 * The saved view catalog could not be read or is not a map of query definitions.
 */
export class ConfigLoadError extends IqError {
    readonly filePath: string;

    constructor(filePath: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Unexpected error while parsing the JSON definition file '${filePath}': ${detail}`, { cause });
        this.name = 'ConfigLoadError';
        this.filePath = filePath;
    }
}

export class ColumnNotFoundError extends IqError {
    readonly column: string;
    readonly setName: string | null;

    constructor(column: string, setName: string | null = null) {
        super(
            setName
                ? `The column '${column}' was not found in set '${setName}'.`
                : `The key '${column}' is not a valid column.`
        );
        this.name = 'ColumnNotFoundError';
        this.column = column;
        this.setName = setName;
    }
}

export class SetNotFoundError extends IqError {
    readonly setName: string;

    constructor(setName: string, databaseId: string) {
        super(`The set '${setName}' was not found in database '${databaseId}'.`);
        this.name = 'SetNotFoundError';
        this.setName = setName;
    }
}

export class QueryBuildError extends IqError {
    constructor(message: string) {
        super(message);
        this.name = 'QueryBuildError';
    }
}

/**
 * A multi-query key column must be supplied by exactly two sub-queries.
 */
export class KeyArityError extends QueryBuildError {
    readonly key: string;
    readonly matches: string[];

    constructor(key: string, matches: string[], message: string) {
        super(message);
        this.name = 'KeyArityError';
        this.key = key;
        this.matches = matches;
    }
}

export class KeyNotJoinableError extends KeyArityError {
    constructor(key: string, matches: string[]) {
        super(
            key,
            matches,
            matches.length === 0
                ? `The key '${key}' was not found in any sub-query. It must exist in two sub-queries.`
                : `The key '${key}' was only found in one sub-query (${matches[0]}). It must exist in two sub-queries.`
        );
        this.name = 'KeyNotJoinableError';
    }
}

export class KeyAmbiguousError extends KeyArityError {
    constructor(key: string, matches: string[]) {
        super(key, matches, `The key '${key}' was found in more than two sub-queries: ${matches.join(', ')}.`);
        this.name = 'KeyAmbiguousError';
    }
}

/**
 * Non-2xx response from the results service.
 */
export class RemoteServiceError extends IqError {
    readonly status: number;
    readonly serviceMessage: string | null;

    constructor(status: number, statusText: string, serviceMessage: string | null, cause?: unknown) {
        super(serviceMessage ?? `Request failed with status code ${status}${statusText ? ` (${statusText})` : ''}`, {
            cause,
        });
        this.name = 'RemoteServiceError';
        this.status = status;
        this.serviceMessage = serviceMessage;
    }
}

export class ResponseFormatError extends IqError {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'ResponseFormatError';
    }
}

export class MissingDatabaseError extends IqError {
    constructor(operation: string) {
        super(`${operation} needs a database id, and none was given, selected or available from the test session.`);
        this.name = 'MissingDatabaseError';
    }
}
