/**
 * Raised before any output is written when the requested converter, float format,
 * schema or schema map cannot be used.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/** A line of the entity source could not be read as a record. */
export class SourceFormatError extends Error {
    constructor(message: string, public readonly lineNumber: number) {
        super(`${message} (line ${lineNumber})`);
        this.name = 'SourceFormatError';
    }
}

/**
 * Encoding failed half-way through an entity. The run stops here: the output file holds
 * everything written so far and must be treated as invalid.
 */
export class FatalEncodingError extends Error {
    constructor(public readonly entityId: number, public readonly cause: unknown) {
        super(`Failed to encode entity #${entityId}: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = 'FatalEncodingError';
    }
}

/**
 * Entities that still form a cycle after topological sorting of the geometry dependencies.
 * Reported through the logs only.
 */
export interface DependencyCycleAnomaly {
    kind: 'dependency-cycle';
    members: number[];
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
