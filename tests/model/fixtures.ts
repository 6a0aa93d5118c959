import { Entity, parseEntityRecord } from '../../src/model/attributeValues';
import { InMemoryModel } from '../../src/model/InMemoryModel';
import { SchemaRegistry } from '../../src/schema/SchemaRegistry';

export const registry = SchemaRegistry.forSchema('IFC4');

/** A wall with one extruded body, its representation context shared with the project. */
export const WALL_MODEL: Array<Record<string, unknown>> = [
    { id: 1, type: 'IfcWall', GlobalId: '0000000000000000000001', Representation: { ref: 10 }, ObjectPlacement: { ref: 30 } },
    { id: 10, type: 'IfcProductDefinitionShape', Representations: [{ ref: 11 }] },
    { id: 11, type: 'IfcShapeRepresentation', ContextOfItems: { ref: 20 }, Items: [{ ref: 12 }] },
    { id: 12, type: 'IfcExtrudedAreaSolid', Position: { ref: 13 }, Depth: 3.0 },
    { id: 13, type: 'IfcAxis2Placement3D' },
    { id: 20, type: 'IfcGeometricRepresentationContext' },
    { id: 21, type: 'IfcProject', RepresentationContexts: [{ ref: 20 }] },
    { id: 30, type: 'IfcLocalPlacement' },
];

export function entities(records: Array<Record<string, unknown>>): Entity[] {
    return records.map(record => {
        const entity = parseEntityRecord(record);
        if (!entity) throw new Error(`test record did not parse: ${JSON.stringify(record)}`);
        return entity;
    });
}

export function modelOf(records: Array<Record<string, unknown>>): InMemoryModel {
    return new InMemoryModel(registry, entities(records));
}
