import { DependencyCycleAnomaly } from '../errors';
import { Entity, referencedIds } from '../model/attributeValues';
import { GeometryModel } from '../model/InMemoryModel';
import { dbg } from '../utils';

export const TYPE_PRODUCT = 'IfcTypeProduct';
export const PRODUCT_DEFINITION_SHAPE = 'IfcProductDefinitionShape';
export const REPRESENTATION_MAPS = 'RepresentationMaps';
export const REPRESENTATION = 'Representation';

/** A product and the product definition shape the geometry kernel should render for it. */
export interface ShapeRequest {
    product: number;
    representation: number;
}

/** An attribute that ties a non-geometry entity to the geometry set. */
export interface GeometryAnchor {
    entityId: number;
    attribute: string;
}

export interface GeometryResolution {
    /** Closure of the type-product representation maps and of every product definition shape. */
    geometry: ReadonlySet<number>;
    /** Geometry ids with dependencies before their dependents, cycle groups last. */
    order: number[];
    anchors: GeometryAnchor[];
    shapes: ShapeRequest[];
    /** Geometry ids referenced only from inside the geometry set once the anchors are severed. */
    obsolete: number[];
    cycles: DependencyCycleAnomaly[];
}

function refsOf(entity: Entity, skipAttribute?: string): number[] {
    const out: number[] = [];
    for (const { name, value } of entity.attributes) {
        if (name === skipAttribute) continue;
        out.push(...referencedIds(value));
    }
    return out;
}

/**
 * Works out which entities only exist to describe geometry.
 *
 * Once the geometry kernel has turned product shapes into geometry triples, those entities
 * are redundant in the output. `resolve()` only reads the model; `prune()` severs the anchors
 * and removes the obsolete entities, and runs only when the caller asks for it.
 */
export class GeometryDependencyResolver {
    constructor(private readonly model: GeometryModel) {}

    resolve(): GeometryResolution {
        const geometry = new Set<number>();
        const anchors: GeometryAnchor[] = [];
        const shapes: ShapeRequest[] = [];

        for (const typeProduct of this.model.byType(TYPE_PRODUCT)) {
            const maps = typeProduct.attributes.find(a => a.name === REPRESENTATION_MAPS);
            if (!maps) continue;
            anchors.push({ entityId: typeProduct.id, attribute: REPRESENTATION_MAPS });
            for (const target of referencedIds(maps.value)) {
                this.addClosure(target, geometry);
            }
        }

        for (const shape of this.model.byType(PRODUCT_DEFINITION_SHAPE)) {
            this.addClosure(shape.id, geometry);
            // ShapeOfProduct: products whose Representation points at this shape
            for (const referrer of this.model.inverse(shape.id)) {
                const product = this.model.get(referrer);
                const attribute = product?.attributes.find(a => a.name === REPRESENTATION);
                if (!attribute || !referencedIds(attribute.value).includes(shape.id)) continue;
                anchors.push({ entityId: referrer, attribute: REPRESENTATION });
                shapes.push({ product: referrer, representation: shape.id });
            }
        }

        const { order, cycles } = this.sortDependencies(geometry);
        const obsolete = this.findObsolete(order, geometry, anchors, cycles);

        dbg(`GeometryDependencyResolver: ${geometry.size} geometry entities, ${anchors.length} anchors, ` +
            `${obsolete.length} obsolete, ${cycles.length} cycles`);
        return { geometry, order, anchors, shapes, obsolete, cycles };
    }

    /** Severs the anchors and removes the obsolete entities from the model. */
    prune(resolution: GeometryResolution): number {
        for (const { entityId, attribute } of resolution.anchors) {
            this.model.clearAttribute(entityId, attribute);
        }
        for (const id of resolution.obsolete) {
            this.model.remove(id);
        }
        dbg(`GeometryDependencyResolver: pruned ${resolution.obsolete.length} entities`);
        return resolution.obsolete.length;
    }

    private addClosure(root: number, geometry: Set<number>): void {
        if (geometry.has(root)) return;
        for (const id of this.model.traverse(root)) {
            geometry.add(id);
        }
    }

    /**
     * Kahn's algorithm over depth-1 references inside the geometry set. Each round emits every
     * entity whose dependencies are all emitted, in ascending id order.
     */
    private sortDependencies(geometry: ReadonlySet<number>): { order: number[]; cycles: DependencyCycleAnomaly[] } {
        const dependencies = new Map<number, Set<number>>();
        const dependents = new Map<number, number[]>();

        for (const id of geometry) {
            const entity = this.model.get(id);
            const deps = new Set<number>();
            for (const target of entity ? refsOf(entity) : []) {
                if (target !== id && geometry.has(target)) deps.add(target);
            }
            dependencies.set(id, deps);
            for (const target of deps) {
                const list = dependents.get(target);
                if (list) {
                    list.push(id);
                } else {
                    dependents.set(target, [id]);
                }
            }
        }

        const pending = new Map<number, number>();
        for (const [id, deps] of dependencies) pending.set(id, deps.size);

        const order: number[] = [];
        let ready = [...pending].filter(([, count]) => count === 0).map(([id]) => id);
        while (ready.length > 0) {
            ready.sort((a, b) => a - b);
            const next: number[] = [];
            for (const id of ready) {
                order.push(id);
                pending.delete(id);
                for (const dependent of dependents.get(id) ?? []) {
                    const count = (pending.get(dependent) ?? 0) - 1;
                    pending.set(dependent, count);
                    if (count === 0) next.push(dependent);
                }
            }
            ready = next;
        }

        const cycles = this.groupResidue([...pending.keys()], dependencies, dependents);
        for (const cycle of cycles) {
            console.warn(`GeometryDependencyResolver: dependency cycle among #${cycle.members.join(', #')}`);
            order.push(...cycle.members);
        }
        return { order, cycles };
    }

    /** Entities Kahn's algorithm could not emit, grouped by connectivity. */
    private groupResidue(
        residue: number[],
        dependencies: Map<number, Set<number>>,
        dependents: Map<number, number[]>
    ): DependencyCycleAnomaly[] {
        const remaining = new Set(residue);
        const groups: DependencyCycleAnomaly[] = [];

        for (const start of [...remaining].sort((a, b) => a - b)) {
            if (!remaining.has(start)) continue;
            remaining.delete(start);
            const members = [start];
            const stack = [start];
            while (stack.length > 0) {
                const current = stack.pop();
                if (current === undefined) break;
                const neighbours = [...(dependencies.get(current) ?? []), ...(dependents.get(current) ?? [])];
                for (const neighbour of neighbours) {
                    if (!remaining.has(neighbour)) continue;
                    remaining.delete(neighbour);
                    members.push(neighbour);
                    stack.push(neighbour);
                }
            }
            groups.push({ kind: 'dependency-cycle', members: members.sort((a, b) => a - b) });
        }
        return groups;
    }

    /** A cycle group is obsolete as a whole or not at all. */
    private findObsolete(
        order: number[],
        geometry: ReadonlySet<number>,
        anchors: GeometryAnchor[],
        cycles: DependencyCycleAnomaly[]
    ): number[] {
        const severed = new Map<number, string>();
        for (const { entityId, attribute } of anchors) severed.set(entityId, attribute);

        const candidates = new Set(order.filter(id =>
            this.model.inverse(id).every(referrer => {
                if (geometry.has(referrer)) return true;
                const entity = this.model.get(referrer);
                // an anchor stops counting once its severed attribute is gone
                return entity === undefined || !refsOf(entity, severed.get(referrer)).includes(id);
            })
        ));
        for (const { members } of cycles) {
            if (members.some(id => !candidates.has(id))) {
                members.forEach(id => candidates.delete(id));
            }
        }
        return order.filter(id => candidates.has(id));
    }
}
