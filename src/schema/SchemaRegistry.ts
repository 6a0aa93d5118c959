import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigurationError } from '../errors';
import { dbg } from '../utils';
import { parseSchemaMap, SchemaCollectionKind, SchemaMap } from './schemaTypes';
import ifc2x3Map from '../../resources/schemas/ifc2x3.json';
import ifc4Map from '../../resources/schemas/ifc4.json';
import ifc4x3Map from '../../resources/schemas/ifc4x3_add2.json';

type ReadFileFn = (path: string) => Promise<string>;

/**
 * Read-only lookup of schema metadata: which attributes hold LIST, SET or ARRAY values,
 * and how entity types inherit from each other.
 *
 * Build one per conversion and hand it to every consumer; instances never change after
 * construction.
 */
export class SchemaRegistry {
    /** Flattened collection attributes per type, own declarations overriding inherited ones. */
    private readonly resolved = new Map<string, ReadonlyMap<string, SchemaCollectionKind>>();
    /** Lower-cased type name to lower-cased supertype name. */
    private readonly supertypes = new Map<string, string>();

    constructor(private readonly map: SchemaMap) {
        for (const [type, entry] of map.entities) {
            if (entry.supertype) {
                this.supertypes.set(type.toLowerCase(), entry.supertype.toLowerCase());
            }
        }
    }

    /**
     * Returns the registry bundled for a schema identifier such as `IFC4X3_ADD2`, `IFC4` or `IFC2X3`.
     * @throws ConfigurationError when no bundled map matches.
     */
    static forSchema(schemaId: string): SchemaRegistry {
        const normalized = schemaId.toUpperCase();
        let raw: unknown;
        if (normalized.includes('4X3')) {
            raw = ifc4x3Map;
        } else if (normalized.includes('IFC4')) {
            raw = ifc4Map;
        } else if (normalized.includes('2X3')) {
            raw = ifc2x3Map;
        } else {
            throw new ConfigurationError(`Unknown schema: ${schemaId}`);
        }
        return new SchemaRegistry(parseSchemaMap(raw, schemaId));
    }

    /**
     * Loads a schema map from a JSON file.
     * @throws ConfigurationError when the file cannot be read or is not a valid schema map.
     */
    static async fromFile(
        filePath: string,
        readFile: ReadFileFn = (p: string) => fs.readFile(p, 'utf-8')
    ): Promise<SchemaRegistry> {
        const resolved = path.resolve(filePath);
        let raw: unknown;
        try {
            raw = JSON.parse(await readFile(resolved));
        } catch (error) {
            throw new ConfigurationError(
                `Failed to load schema map ${resolved}: ${error instanceof Error ? error.message : String(error)}`
            );
        }
        const registry = new SchemaRegistry(parseSchemaMap(raw, resolved));
        dbg(`SchemaRegistry: loaded ${registry.schemaId} from ${resolved}`);
        return registry;
    }

    get schemaId(): string {
        return this.map.schema;
    }

    collectionKind(entityType: string, attribute: string): SchemaCollectionKind {
        return this.collectionsOf(entityType).get(attribute) ?? 'None';
    }

    /** True when `entityType` is `ancestor` or inherits from it. Names compare case-insensitively. */
    isSubtypeOf(entityType: string, ancestor: string): boolean {
        const target = ancestor.toLowerCase();
        const seen = new Set<string>();
        let current: string | undefined = entityType.toLowerCase();
        while (current && !seen.has(current)) {
            if (current === target) return true;
            seen.add(current);
            current = this.supertypes.get(current);
        }
        return false;
    }

    private collectionsOf(entityType: string): ReadonlyMap<string, SchemaCollectionKind> {
        const cached = this.resolved.get(entityType);
        if (cached) return cached;

        // Walk up from the type itself; the first declaration of an attribute wins.
        const flattened = new Map<string, SchemaCollectionKind>();
        const seen = new Set<string>();
        let current: string | undefined = entityType;
        while (current && !seen.has(current)) {
            seen.add(current);
            const entry = this.map.entities.get(current);
            if (!entry) break;
            for (const [attribute, kind] of entry.collections) {
                if (!flattened.has(attribute)) flattened.set(attribute, kind);
            }
            current = entry.supertype;
        }

        this.resolved.set(entityType, flattened);
        return flattened;
    }
}
