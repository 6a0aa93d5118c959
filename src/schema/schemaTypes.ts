import { ConfigurationError } from '../errors';

export type SchemaCollectionKind = 'List' | 'Set' | 'Array' | 'None';

export interface SchemaEntityEntry {
    supertype?: string;
    /** Attribute name to collection kind, for the attributes declared directly on this type. */
    collections: Map<string, Exclude<SchemaCollectionKind, 'None'>>;
}

export interface SchemaMap {
    schema: string;
    /** Keyed by type name as written in the map. */
    entities: ReadonlyMap<string, SchemaEntityEntry>;
}

const KIND_BY_KEYWORD = new Map<string, Exclude<SchemaCollectionKind, 'None'>>([
    ['LIST', 'List'],
    ['SET', 'Set'],
    ['ARRAY', 'Array'],
]);

function isRecord(raw: unknown): raw is Record<string, unknown> {
    return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

/**
 * Validates a schema map read from JSON. Collection keywords are the EXPRESS ones
 * (`LIST`, `SET`, `ARRAY`), in any case.
 * @param source - Named in error messages.
 */
export function parseSchemaMap(raw: unknown, source: string): SchemaMap {
    if (!isRecord(raw)) {
        throw new ConfigurationError(`Schema map ${source} must be a JSON object`);
    }
    const schema = raw.schema;
    if (typeof schema !== 'string' || !schema.trim()) {
        throw new ConfigurationError(`Schema map ${source} has no "schema" identifier`);
    }
    if (!isRecord(raw.entities)) {
        throw new ConfigurationError(`Schema map ${source} has no "entities" object`);
    }

    const entities = new Map<string, SchemaEntityEntry>();
    for (const [type, rawEntry] of Object.entries(raw.entities)) {
        if (!isRecord(rawEntry)) {
            throw new ConfigurationError(`Schema map ${source}: entry for ${type} must be an object`);
        }
        const entry: SchemaEntityEntry = { collections: new Map() };
        if (rawEntry.supertype !== undefined) {
            if (typeof rawEntry.supertype !== 'string') {
                throw new ConfigurationError(`Schema map ${source}: supertype of ${type} must be a string`);
            }
            entry.supertype = rawEntry.supertype;
        }
        if (rawEntry.collections !== undefined) {
            if (!isRecord(rawEntry.collections)) {
                throw new ConfigurationError(`Schema map ${source}: collections of ${type} must be an object`);
            }
            for (const [attribute, keyword] of Object.entries(rawEntry.collections)) {
                const kind = typeof keyword === 'string' ? KIND_BY_KEYWORD.get(keyword.toUpperCase()) : undefined;
                if (!kind) {
                    throw new ConfigurationError(
                        `Schema map ${source}: ${type}.${attribute} has unknown collection kind ${JSON.stringify(keyword)}`
                    );
                }
                entry.collections.set(attribute, kind);
            }
        }
        entities.set(type, entry);
    }

    return { schema: schema.trim(), entities };
}
