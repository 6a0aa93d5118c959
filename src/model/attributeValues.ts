/**
 * Attribute values as they travel from the entity source to the encoder.
 * Raw records are parsed into this union once, at ingestion; everything downstream
 * switches on `kind`.
 */

export type CollectionKind = 'List' | 'Set' | 'Array' | 'Unknown';

export interface StringLiteral {
    kind: 'string';
    value: string;
}

export interface IntegerLiteral {
    kind: 'integer';
    value: number;
}

export interface FloatLiteral {
    kind: 'float';
    value: number;
}

export interface BooleanLiteral {
    kind: 'boolean';
    value: boolean;
}

export type Literal = StringLiteral | IntegerLiteral | FloatLiteral | BooleanLiteral;

export interface Reference {
    kind: 'reference';
    target: number;
}

/** A SELECT-style value that carries its declared type, e.g. `IfcLabel("Oak")`. */
export interface TypedValue {
    kind: 'typed';
    declaredType: string;
    inner: AttributeValue;
}

export interface Collection {
    kind: 'collection';
    collectionKind: CollectionKind;
    items: AttributeValue[];
}

export type AttributeValue = Literal | Reference | TypedValue | Collection;

export interface Attribute {
    name: string;
    value: AttributeValue;
}

export interface Entity {
    readonly id: number;
    readonly type: string;
    readonly attributes: ReadonlyArray<Attribute>;
}

/** Collections nested deeper than this are treated as unsupported input. */
export const MAX_VALUE_DEPTH = 32;

const LOCAL_NAME_RE = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/** Whether `name` can be written after a prefix (`ifc:<name>`) without escaping. */
export function isLocalName(name: string): boolean {
    return LOCAL_NAME_RE.test(name);
}

function isRecord(raw: unknown): raw is Record<string, unknown> {
    return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

function isEntityId(raw: unknown): raw is number {
    return typeof raw === 'number' && Number.isSafeInteger(raw) && raw > 0;
}

export function stringLiteral(value: string): StringLiteral {
    return { kind: 'string', value };
}

export function integerLiteral(value: number): IntegerLiteral {
    return { kind: 'integer', value };
}

export function floatLiteral(value: number): FloatLiteral {
    return { kind: 'float', value };
}

export function booleanLiteral(value: boolean): BooleanLiteral {
    return { kind: 'boolean', value };
}

export function reference(target: number): Reference {
    return { kind: 'reference', target };
}

export function typedValue(declaredType: string, inner: AttributeValue): TypedValue {
    return { kind: 'typed', declaredType, inner };
}

export function collection(items: AttributeValue[], collectionKind: CollectionKind = 'Unknown'): Collection {
    return { kind: 'collection', collectionKind, items };
}

/**
 * Parses one raw attribute value.
 * Returns `undefined` for absent values and for shapes that are not understood; both are
 * left out of the output.
 */
export function parseAttributeValue(raw: unknown, depth = 0): AttributeValue | undefined {
    if (raw === null || raw === undefined) return undefined;
    if (depth > MAX_VALUE_DEPTH) return undefined;

    switch (typeof raw) {
        case 'string':
            return stringLiteral(raw);
        case 'boolean':
            return booleanLiteral(raw);
        case 'number':
            return Number.isSafeInteger(raw) ? integerLiteral(raw) : floatLiteral(raw);
        case 'object':
            break;
        default:
            return undefined;
    }

    if (Array.isArray(raw)) {
        const items: AttributeValue[] = [];
        for (const item of raw) {
            const parsed = parseAttributeValue(item, depth + 1);
            if (parsed) items.push(parsed);
        }
        return collection(items);
    }

    if (!isRecord(raw)) return undefined;

    if ('ref' in raw) {
        return isEntityId(raw.ref) ? reference(raw.ref) : undefined;
    }

    if ('type' in raw && 'value' in raw) {
        const declaredType = raw.type;
        if (typeof declaredType !== 'string' || !isLocalName(declaredType)) return undefined;
        const inner = parseAttributeValue(raw.value, depth + 1);
        return inner ? typedValue(declaredType, inner) : undefined;
    }

    return undefined;
}

/**
 * Parses a raw stream record `{ id, type, <attr>: <value>, ... }`.
 * Returns `null` when the record has no usable id or type; such records are dropped.
 */
export function parseEntityRecord(raw: unknown): Entity | null {
    if (!isRecord(raw)) return null;
    const { id, type } = raw;
    if (!isEntityId(id)) return null;
    if (typeof type !== 'string' || !isLocalName(type)) return null;

    const attributes: Attribute[] = [];
    for (const [name, rawValue] of Object.entries(raw)) {
        if (name === 'id' || name === 'type') continue;
        if (!isLocalName(name)) continue;
        const value = parseAttributeValue(rawValue);
        if (value) attributes.push({ name, value });
    }
    return { id, type, attributes };
}

/** The entity's `GlobalId` attribute, when it is a plain string. */
export function globalIdOf(entity: Entity): string | undefined {
    const attribute = entity.attributes.find(a => a.name === 'GlobalId');
    if (!attribute) return undefined;
    const value = attribute.value;
    if (value.kind === 'string') return value.value;
    if (value.kind === 'typed' && value.inner.kind === 'string') return value.inner.value;
    return undefined;
}

/** Ids referenced directly (depth 1) by the value, in encounter order. */
export function referencedIds(value: AttributeValue): number[] {
    const out: number[] = [];
    const work: AttributeValue[] = [value];
    while (work.length > 0) {
        const current = work.pop();
        if (!current) break;
        switch (current.kind) {
            case 'reference':
                out.push(current.target);
                break;
            case 'typed':
                work.push(current.inner);
                break;
            case 'collection':
                for (let i = current.items.length - 1; i >= 0; i--) {
                    work.push(current.items[i]);
                }
                break;
            default:
                break;
        }
    }
    return out;
}
