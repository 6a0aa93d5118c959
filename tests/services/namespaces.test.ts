import { expect } from 'chai';
import { describe, it } from 'mocha';
import { getNamespaces, prefixEntries, schemaNamespace } from '../../src/services/namespaces';
import { writeHeader } from '../../src/serializer/header';

describe('namespaces', () => {
    it('should list the prefixes in header order', () => {
        const namespaces = getNamespaces('IFC4', { baseUri: 'http://example.org/b#', instanceNamespace: 'http://example.org/i#' });
        expect(Object.keys(namespaces)).to.deep.equal(['BASE', 'ifc', 'inst', 'rdf', 'rdfs', 'xsd', 'owl', 'geo']);
        expect(namespaces.rdf).to.equal('http://www.w3.org/1999/02/22-rdf-syntax-ns#');
        expect(prefixEntries(namespaces).map(([prefix]) => prefix)).to.deep.equal(['ifc', 'inst', 'rdf', 'rdfs', 'xsd', 'owl', 'geo']);
    });

    it('should put the schema identifier into the model namespace', () => {
        expect(schemaNamespace('IFC2X3', 'http://example.org/{schema}/{schema}#')).to.equal('http://example.org/IFC2X3/IFC2X3#');
    });

    it('should write the header with the ontology declaration last', () => {
        const header = writeHeader(
            getNamespaces('IFC4', {
                baseUri: 'http://example.org/b#',
                instanceNamespace: 'http://example.org/i#',
                schemaNamespaceTemplate: 'http://example.org/{schema}#',
            }),
            new Date('2024-05-06T07:08:09.000Z')
        );
        const lines = header.split('\n');
        expect(lines.slice(0, 7)).to.deep.equal([
            '# Turtle output generated by the ifc2ttl streaming writer.',
            '# Generated on: 2024-05-06T07:08:09.000Z',
            '# baseURI: http://example.org/b#',
            '# imports: http://example.org/IFC4#',
            '',
            'BASE <http://example.org/b#>',
            'PREFIX ifc: <http://example.org/IFC4#>',
        ]);
        expect(header.endsWith('\ninst:\ta\towl:Ontology ;\n\towl:imports\tifc: .\n\n')).to.be.true;
    });
});
