import { SchemaRegistry } from '../schema/SchemaRegistry';
import { dbg } from '../utils';
import { Entity, parseEntityRecord, referencedIds } from './attributeValues';

/**
 * Random access to a loaded model, as needed by geometry dependency resolution.
 * Mutations are explicit calls; nothing changes the model behind the caller's back.
 */
export interface GeometryModel {
    get(id: number): Entity | undefined;
    /** Entities of `type` or any of its subtypes, in load order. */
    byType(type: string): Entity[];
    /** Ids reachable from `id` through references, `id` first, breadth-first, each once. */
    traverse(id: number, maxLevels?: number): number[];
    /** Ids of the entities that reference `id` directly. */
    inverse(id: number): number[];
    clearAttribute(id: number, attribute: string): void;
    remove(id: number): void;
}

/**
 * Entities held in memory with an index of incoming references.
 * Iterating the model yields the entities in load order.
 */
export class InMemoryModel implements GeometryModel, Iterable<Entity> {
    private readonly entities = new Map<number, Entity>();
    /** target id -> ids referencing it */
    private readonly referrers = new Map<number, Set<number>>();

    constructor(private readonly registry: SchemaRegistry, entities: Iterable<Entity> = []) {
        for (const entity of entities) {
            this.add(entity);
        }
    }

    /** Loads raw stream records; malformed ones are skipped. */
    static async fromRecords(
        registry: SchemaRegistry,
        records: Iterable<unknown> | AsyncIterable<unknown>
    ): Promise<InMemoryModel> {
        const model = new InMemoryModel(registry);
        let skipped = 0;
        for await (const record of records) {
            const entity = parseEntityRecord(record);
            if (entity) {
                model.add(entity);
            } else {
                skipped += 1;
            }
        }
        dbg(`InMemoryModel: loaded ${model.size} entities (${skipped} malformed records skipped)`);
        return model;
    }

    get size(): number {
        return this.entities.size;
    }

    add(entity: Entity): void {
        if (this.entities.has(entity.id)) {
            this.unlink(entity.id);
        }
        this.entities.set(entity.id, entity);
        this.link(entity);
    }

    get(id: number): Entity | undefined {
        return this.entities.get(id);
    }

    byType(type: string): Entity[] {
        return [...this.entities.values()].filter(e => this.registry.isSubtypeOf(e.type, type));
    }

    traverse(id: number, maxLevels = Infinity): number[] {
        if (!this.entities.has(id)) return [];
        const order: number[] = [id];
        const seen = new Set<number>([id]);
        let frontier = [id];
        let level = 0;

        while (frontier.length > 0 && level < maxLevels) {
            const next: number[] = [];
            for (const current of frontier) {
                for (const target of this.outgoing(current)) {
                    if (seen.has(target) || !this.entities.has(target)) continue;
                    seen.add(target);
                    order.push(target);
                    next.push(target);
                }
            }
            frontier = next;
            level += 1;
        }
        return order;
    }

    inverse(id: number): number[] {
        return [...(this.referrers.get(id) ?? [])].sort((a, b) => a - b);
    }

    clearAttribute(id: number, attribute: string): void {
        const entity = this.entities.get(id);
        if (!entity || !entity.attributes.some(a => a.name === attribute)) return;
        this.unlink(id);
        const updated: Entity = {
            id: entity.id,
            type: entity.type,
            attributes: entity.attributes.filter(a => a.name !== attribute),
        };
        this.entities.set(id, updated);
        this.link(updated);
    }

    remove(id: number): void {
        if (!this.entities.has(id)) return;
        this.unlink(id);
        this.entities.delete(id);
    }

    [Symbol.iterator](): Iterator<Entity> {
        return this.entities.values();
    }

    /** Direct references of an entity, first occurrence order. */
    private outgoing(id: number): number[] {
        const entity = this.entities.get(id);
        if (!entity) return [];
        const out = new Set<number>();
        for (const { value } of entity.attributes) {
            for (const target of referencedIds(value)) out.add(target);
        }
        return [...out];
    }

    private link(entity: Entity): void {
        for (const target of this.outgoing(entity.id)) {
            const set = this.referrers.get(target);
            if (set) {
                set.add(entity.id);
            } else {
                this.referrers.set(target, new Set([entity.id]));
            }
        }
    }

    private unlink(id: number): void {
        for (const target of this.outgoing(id)) {
            this.referrers.get(target)?.delete(id);
        }
    }
}
