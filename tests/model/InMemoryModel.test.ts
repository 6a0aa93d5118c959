import { expect } from 'chai';
import { describe, it } from 'mocha';
import { InMemoryModel } from '../../src/model/InMemoryModel';
import { WALL_MODEL, entities, modelOf, registry } from './fixtures';

describe('InMemoryModel', () => {
    it('should find entities by type including subtypes', () => {
        const model = modelOf([...WALL_MODEL, { id: 40, type: 'IfcWallType' }]);
        expect(model.byType('IfcProduct').map(e => e.id)).to.deep.equal([1]);
        expect(model.byType('IfcTypeProduct').map(e => e.id)).to.deep.equal([40]);
        expect(model.byType('ifcwall').map(e => e.id)).to.deep.equal([1]);
        expect(model.byType('IfcRepresentation').map(e => e.id)).to.deep.equal([11]);
    });

    it('should traverse references breadth-first, each entity once', () => {
        const model = modelOf(WALL_MODEL);
        expect(model.traverse(10)).to.deep.equal([10, 11, 20, 12, 13]);
        expect(model.traverse(10, 1)).to.deep.equal([10, 11]);
        expect(model.traverse(99)).to.deep.equal([]);
    });

    it('should index incoming references', () => {
        const model = modelOf(WALL_MODEL);
        expect(model.inverse(20)).to.deep.equal([11, 21]);
        expect(model.inverse(10)).to.deep.equal([1]);
        expect(model.inverse(1)).to.deep.equal([]);
    });

    it('should update the index when an attribute is cleared', () => {
        const model = modelOf(WALL_MODEL);
        model.clearAttribute(1, 'Representation');
        expect(model.inverse(10)).to.deep.equal([]);
        expect(model.get(1)?.attributes.map(a => a.name)).to.deep.equal(['GlobalId', 'ObjectPlacement']);
        expect(model.inverse(30)).to.deep.equal([1]);
    });

    it('should forget removed entities and their outgoing references', () => {
        const model = modelOf(WALL_MODEL);
        model.remove(11);
        expect(model.get(11)).to.be.undefined;
        expect(model.inverse(20)).to.deep.equal([21]);
        expect(model.traverse(10)).to.deep.equal([10]);
        expect(model.size).to.equal(WALL_MODEL.length - 1);
    });

    it('should re-link an entity that is added again', () => {
        const model = modelOf(WALL_MODEL);
        const [replacement] = entities([{ id: 21, type: 'IfcProject' }]);
        model.add(replacement);
        expect(model.inverse(20)).to.deep.equal([11]);
    });

    it('should load raw records in order and skip malformed ones', async () => {
        async function* records() {
            yield { id: 2, type: 'IfcWall' };
            yield { id: -1, type: 'IfcWall' };
            yield { id: 1, type: 'IfcSlab' };
        }
        const model = await InMemoryModel.fromRecords(registry, records());
        expect([...model].map(e => e.id)).to.deep.equal([2, 1]);
    });
});
