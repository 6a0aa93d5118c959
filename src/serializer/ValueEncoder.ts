import { FLOAT_FORMATS, FloatFormat } from '../config';
import { ConfigurationError } from '../errors';
import { AttributeValue, Collection, CollectionKind, Entity, TypedValue } from '../model/attributeValues';
import { SchemaRegistry } from '../schema/SchemaRegistry';
import { formatLiteral, instanceRef } from './turtle';

export interface EncodedValue {
    /** Turtle object text, e.g. `inst:ref_7` or `( "A" "B" )`. */
    text: string;
    /** Triples this value adds to the output, auxiliary typed-entity statements included. */
    triples: number;
}

export interface EncodedEntity {
    /** `inst:ref_ID a ifc:Type ;\n\t... .\n\n` */
    block: string;
    /** One `... .\n` statement per typed value, in allocation order. */
    auxiliary: string[];
    triples: number;
}

export interface ValueEncoderOptions {
    floatFormat?: FloatFormat | string;
    /** Prefix of the model-schema namespace, without the colon. */
    schemaPrefix?: string;
}

/** An item of a collection after encoding. */
interface EncodedItem {
    text: string;
    /** List cells of a nested collection (its items plus theirs, recursively); 0 otherwise. */
    cells: number;
    /** Triples of auxiliary statements the item allocated. */
    auxiliary: number;
}

/**
 * Synthetic typed entities allocated while encoding one owning entity.
 * Ids run `<origin>_t1`, `<origin>_t2`, ... and are never reused.
 */
class TypedEntityScope {
    private counter = 0;
    readonly statements: string[] = [];

    constructor(readonly originId: number) {}

    allocate(): { id: string; slot: number } {
        this.counter += 1;
        const slot = this.statements.length;
        this.statements.push('');
        return { id: instanceRef(`${this.originId}_t${this.counter}`), slot };
    }

    fill(slot: number, statement: string): void {
        this.statements[slot] = statement;
    }
}

/**
 * Turns attribute values into Turtle object syntax with an exact triple count.
 *
 * Collection kinds come from the schema registry: SET attributes become comma-separated
 * object lists, LIST and ARRAY attributes become RDF collections. Attributes the schema
 * does not know as collections fall back to a Set when every item is a reference and to
 * a List otherwise.
 */
export class ValueEncoder {
    readonly floatFormat: FloatFormat;
    private readonly schemaPrefix: string;

    constructor(private readonly registry: SchemaRegistry, options: ValueEncoderOptions = {}) {
        const floatFormat = options.floatFormat ?? 'scientific';
        if (!isFloatFormat(floatFormat)) {
            throw new ConfigurationError(
                `Unknown float format '${floatFormat}'. Available: ${FLOAT_FORMATS.join(', ')}`
            );
        }
        this.floatFormat = floatFormat;
        this.schemaPrefix = options.schemaPrefix ?? 'ifc';
    }

    encodeEntity(entity: Entity): EncodedEntity {
        const scope = new TypedEntityScope(entity.id);
        const parts = [`${instanceRef(entity.id)} a ${this.term(entity.type)}`];
        let triples = 1;

        for (const { name, value } of entity.attributes) {
            const encoded = this.encodeAttribute(entity.type, name, value, scope);
            parts.push(` ;\n\t${this.term(name)} ${encoded.text}`);
            triples += encoded.triples;
        }

        return {
            block: parts.join('') + ' .\n\n',
            auxiliary: scope.statements,
            triples,
        };
    }

    private encodeAttribute(entityType: string, name: string, value: AttributeValue, scope: TypedEntityScope): EncodedValue {
        switch (value.kind) {
            case 'collection': {
                const schemaKind = this.registry.collectionKind(entityType, name);
                return this.encodeCollection(value, schemaKind === 'None' ? 'Unknown' : schemaKind, scope);
            }
            case 'typed': {
                const { id, auxiliary } = this.encodeTyped(value, scope);
                return { text: id, triples: 1 + auxiliary };
            }
            case 'reference':
                return { text: instanceRef(value.target), triples: 1 };
            default:
                return { text: formatLiteral(value, this.floatFormat), triples: 1 };
        }
    }

    private encodeCollection(value: Collection, kind: CollectionKind, scope: TypedEntityScope): EncodedValue {
        if (value.items.length === 0) {
            // Marker convention: an empty collection of any kind counts one triple.
            return { text: '()', triples: 1 };
        }

        const items = value.items.map(item => this.encodeItem(item, scope));
        const nestedCells = items.reduce((sum, item) => sum + item.cells, 0);
        const auxiliary = items.reduce((sum, item) => sum + item.auxiliary, 0);

        // typed values are written as instance ids too, so they count as references here
        const effectiveKind = kind === 'Unknown'
            ? (value.items.every(item => item.kind === 'reference' || item.kind === 'typed') ? 'Set' : 'List')
            : kind;

        if (effectiveKind === 'Set') {
            return {
                text: items.map(item => item.text).join(', '),
                triples: items.length + 2 * nestedCells + auxiliary,
            };
        }
        return {
            text: `( ${items.map(item => item.text).join(' ')} )`,
            triples: 1 + 2 * items.length + 2 * nestedCells + auxiliary,
        };
    }

    private encodeItem(item: AttributeValue, scope: TypedEntityScope): EncodedItem {
        switch (item.kind) {
            case 'reference':
                return { text: instanceRef(item.target), cells: 0, auxiliary: 0 };
            case 'typed': {
                const { id, auxiliary } = this.encodeTyped(item, scope);
                return { text: id, cells: 0, auxiliary };
            }
            case 'collection':
                return this.encodeNested(item, scope);
            default:
                return { text: formatLiteral(item, this.floatFormat), cells: 0, auxiliary: 0 };
        }
    }

    /** Nested collections are always ordered. */
    private encodeNested(value: Collection, scope: TypedEntityScope): EncodedItem {
        if (value.items.length === 0) {
            return { text: '()', cells: 0, auxiliary: 0 };
        }
        const items = value.items.map(item => this.encodeItem(item, scope));
        return {
            text: `( ${items.map(item => item.text).join(' ')} )`,
            cells: items.length + items.reduce((sum, item) => sum + item.cells, 0),
            auxiliary: items.reduce((sum, item) => sum + item.auxiliary, 0),
        };
    }

    /**
     * Allocates the synthetic entity for a typed value and records its statement.
     * `auxiliary` is the triple count of that statement plus any statements nested inside it.
     */
    private encodeTyped(value: TypedValue, scope: TypedEntityScope): { id: string; auxiliary: number } {
        const { id, slot } = scope.allocate();
        const inner = value.inner;
        let encoded: EncodedValue;
        switch (inner.kind) {
            case 'collection':
                encoded = this.encodeCollection(inner, 'List', scope);
                break;
            case 'typed': {
                const nested = this.encodeTyped(inner, scope);
                encoded = { text: nested.id, triples: 1 + nested.auxiliary };
                break;
            }
            case 'reference':
                encoded = { text: instanceRef(inner.target), triples: 1 };
                break;
            default:
                encoded = { text: formatLiteral(inner, this.floatFormat), triples: 1 };
                break;
        }
        scope.fill(slot, `${id} ${this.term(value.declaredType)} ${encoded.text} .\n`);
        return { id, auxiliary: encoded.triples };
    }

    private term(localName: string): string {
        return `${this.schemaPrefix}:${localName}`;
    }
}

export function isFloatFormat(value: string): value is FloatFormat {
    return FLOAT_FORMATS.some(format => format === value);
}
