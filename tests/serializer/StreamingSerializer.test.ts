import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, afterEach } from 'mocha';
import { Parser } from 'n3';
import { ConfigurationError, FatalEncodingError } from '../../src/errors';
import { MemorySink } from '../../src/io/sinks';
import { Entity } from '../../src/model/attributeValues';
import { SchemaRegistry } from '../../src/schema/SchemaRegistry';
import { GeometrySubgraphs, StreamingSerializer, StreamingSerializerOptions, Triple } from '../../src/serializer/StreamingSerializer';
import { getNamespaces } from '../../src/services/namespaces';

const registry = SchemaRegistry.forSchema('IFC4');
const namespaces = getNamespaces('IFC4', {
    baseUri: 'http://example.org/base#',
    instanceNamespace: 'http://example.org/inst#',
    schemaNamespaceTemplate: 'http://example.org/{schema}/owl#',
});
const fixedNow = () => new Date('2024-01-02T03:04:05.000Z');

const HEADER = [
    '# Turtle output generated by the ifc2ttl streaming writer.',
    '# Generated on: 2024-01-02T03:04:05.000Z',
    '# baseURI: http://example.org/base#',
    '# imports: http://example.org/IFC4/owl#',
    '',
    'BASE <http://example.org/base#>',
    'PREFIX ifc: <http://example.org/IFC4/owl#>',
    'PREFIX inst: <http://example.org/inst#>',
    'PREFIX rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#>',
    'PREFIX rdfs: <http://www.w3.org/2000/01/rdf-schema#>',
    'PREFIX xsd: <http://www.w3.org/2001/XMLSchema#>',
    'PREFIX owl: <http://www.w3.org/2002/07/owl#>',
    'PREFIX geo: <http://www.opengis.net/ont/geosparql#>',
    '',
    'inst:\ta\towl:Ontology ;',
    '\towl:imports\tifc: .',
    '',
    '',
].join('\n');

const WALL = { id: 42, type: 'Wall', name: { ref: 7 }, tags: ['A', 'B'] };
const DOOR = { id: 9, type: 'Door', material: { type: 'Label', value: 'Oak' } };
const AGGREGATES = { id: 5, type: 'IfcRelAggregates', RelatedObjects: [{ ref: 2 }, { ref: 3 }] };
const MESH = { id: 11, type: 'Mesh', CoordList: [[1, 2], [3, 4]], Empty: [] };

function serializer(options: Partial<StreamingSerializerOptions> = {}): StreamingSerializer {
    return new StreamingSerializer(registry, { namespaces, now: fixedNow, ...options });
}

describe('StreamingSerializer', () => {
    afterEach(() => {
        sinon.restore();
    });

    it('should write the header followed by one block per entity', async () => {
        const sink = new MemorySink();
        const metrics = await serializer().run([WALL], sink);
        expect(sink.toString()).to.equal(
            HEADER + 'inst:ref_42 a ifc:Wall ;\n\tifc:name inst:ref_7 ;\n\tifc:tags ( "A" "B" ) .\n\n'
        );
        expect(metrics).to.deep.equal({ entitiesProcessed: 1, triplesWritten: 2 + 7 });
    });

    it('should place typed value statements after their owning block', async () => {
        const sink = new MemorySink();
        await serializer().run([DOOR], sink);
        expect(sink.toString().slice(HEADER.length)).to.equal(
            'inst:ref_9 a ifc:Door ;\n\tifc:material inst:ref_9_t1 .\n\ninst:ref_9_t1 ifc:Label "Oak" .\n'
        );
    });

    it('should count exactly the triples a Turtle parser reads', async () => {
        const sink = new MemorySink();
        const metrics = await serializer().run([WALL, DOOR, AGGREGATES, MESH], sink);
        const quads = new Parser().parse(sink.toString());
        // 2 header + 7 + 3 + 3 + (1 + 1 + 4 + 8 + 1)
        expect(metrics.triplesWritten).to.equal(30);
        expect(quads).to.have.length(metrics.triplesWritten);
    });

    it('should write the same bytes whatever the buffer size', async () => {
        const small = new MemorySink();
        const large = new MemorySink();
        await serializer({ bufferSize: 1 }).run([WALL, DOOR, AGGREGATES], small);
        await serializer({ bufferSize: 100000 }).run([WALL, DOOR, AGGREGATES], large);
        expect(small.toString()).to.equal(large.toString());
        // header, then one write per entity
        expect(small.chunks).to.have.length(4);
        expect(large.chunks).to.have.length(2);
    });

    it('should read records from an async stream and skip malformed ones', async () => {
        async function* records() {
            yield { id: 0, type: 'Wall' };
            yield 'not a record';
            yield { id: 3, type: 'Bad Type' };
            yield WALL;
        }
        const metrics = await serializer().run(records(), new MemorySink());
        expect(metrics.entitiesProcessed).to.equal(1);
    });

    it('should encode types named like object members without failing', async () => {
        const sink = new MemorySink();
        const metrics = await serializer().run([{ id: 1, type: 'constructor', Items: [{ ref: 2 }, { ref: 3 }] }], sink);
        // unknown kind, all references: a Set of two
        expect(metrics).to.deep.equal({ entitiesProcessed: 1, triplesWritten: 2 + 3 });
    });

    it('should append geometry triples after the entity statements', async () => {
        const geometry: GeometrySubgraphs = {
            lookup: (entity: Entity, label: string): Triple[] =>
                entity.id === 9 ? [[label, 'a', 'geo:Feature'], [label, 'geo:hasGeometry', '_:g1']] : [],
        };
        const sink = new MemorySink();
        const metrics = await serializer({ geometry }).run([DOOR], sink);
        expect(sink.toString().slice(HEADER.length)).to.equal(
            'inst:ref_9 a ifc:Door ;\n\tifc:material inst:ref_9_t1 .\n\n' +
            'inst:ref_9_t1 ifc:Label "Oak" .\n' +
            'inst:ref_9 a geo:Feature .\ninst:ref_9 geo:hasGeometry _:g1 .\n\n'
        );
        expect(metrics.triplesWritten).to.equal(2 + 3 + 2);
    });

    it('should flush completed entities and name the failing one on a fatal error', async () => {
        const geometry: GeometrySubgraphs = {
            lookup: (entity: Entity): Triple[] => {
                if (entity.id === 9) throw new Error('kernel output is corrupt');
                return [];
            },
        };
        const sink = new MemorySink();
        try {
            await serializer({ geometry }).run([WALL, DOOR, AGGREGATES], sink);
            expect.fail('Should have thrown');
        } catch (error) {
            expect(error).to.be.instanceOf(FatalEncodingError);
            if (error instanceof FatalEncodingError) {
                expect(error.entityId).to.equal(9);
                expect(error.message).to.equal('Failed to encode entity #9: kernel output is corrupt');
            }
        }
        expect(sink.toString()).to.equal(
            HEADER + 'inst:ref_42 a ifc:Wall ;\n\tifc:name inst:ref_7 ;\n\tifc:tags ( "A" "B" ) .\n\n'
        );
    });

    it('should refuse to run twice', async () => {
        const instance = serializer();
        await instance.run([], new MemorySink());
        try {
            await instance.run([], new MemorySink());
            expect.fail('Should have thrown');
        } catch (error) {
            expect(String(error)).to.contain('may only be called once');
        }
    });

    it('should reject a buffer size below one', () => {
        expect(() => serializer({ bufferSize: 0 })).to.throw(ConfigurationError, 'Buffer size must be a positive integer, got 0');
    });
});
