import { BlankNode, DataFactory, Literal, NamedNode, Parser, Quad, Store } from 'n3';
import { Entity, globalIdOf } from '../model/attributeValues';
import { Triple, GeometrySubgraphs } from '../serializer/StreamingSerializer';
import { escapeTurtleString } from '../serializer/turtle';
import { BASE_KEY, GEOSPARQL_NAMESPACE, NamespaceTable } from '../services/namespaces';
import { dbg } from '../utils';
import { guidFromFeatureIri } from './guid';
import { DEFAULT_WKT_PRECISION, roundWkt } from './wkt';

const RDF_TYPE = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#type';
const XSD_STRING = 'http://www.w3.org/2001/XMLSchema#string';
const RDF_LANG_STRING = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#langString';
const FEATURE = `${GEOSPARQL_NAMESPACE}Feature`;
const WKT_LITERAL = `${GEOSPARQL_NAMESPACE}wktLiteral`;

/** Annotation predicates that are not part of the geometry itself. */
export const SKIPPED_PREDICATES: readonly string[] = [
    'http://www.w3.org/2000/01/rdf-schema#label',
    'http://purl.org/dc/terms/identifier',
];

/** Derived by the kernel rather than present in the model. */
export const DEFAULT_DERIVED_MARKERS: readonly string[] = ['body_footprint_geometry'];

export const DEFAULT_MAX_NODES = 100000;

const PLAIN_LOCAL_RE = /^[A-Za-z0-9_-]*$/;

export interface SubgraphExtractorOptions {
    namespaces?: NamespaceTable;
    /** Objects whose value contains any of these substrings are dropped. */
    derivedMarkers?: readonly string[];
    /** Fraction digits kept in well-known-text literals. */
    wktPrecision?: number;
    /** Nodes visited per lookup before traversal stops. */
    maxNodes?: number;
}

type ResourceTerm = NamedNode | BlankNode;
type Term = Quad['subject'] | Quad['predicate'] | Quad['object'];

function isResource(term: Term): term is ResourceTerm {
    return term.termType === 'NamedNode' || term.termType === 'BlankNode';
}

function nodeKey(term: ResourceTerm): string {
    return term.termType === 'BlankNode' ? `_:${term.value}` : term.value;
}

/**
 * Index over the geometry Turtle produced by the geometry kernel.
 *
 * Every `geo:Feature` subject is filed under the GlobalId decoded from its name, so the
 * serializer can pull the geometry of a product by GUID and attach it to the product's
 * own IRI. Read-only once built.
 */
export class GuidIndexedSubgraphExtractor implements GeometrySubgraphs {
    private readonly guidToSubjects = new Map<string, NamedNode[]>();
    private readonly prefixes: Array<[string, string]>;
    private readonly derivedMarkers: readonly string[];
    private readonly wktPrecision: number;
    private readonly maxNodes: number;

    constructor(private readonly store: Store, options: SubgraphExtractorOptions = {}) {
        this.prefixes = Object.entries(options.namespaces ?? {}).filter(([prefix]) => prefix !== BASE_KEY);
        this.derivedMarkers = options.derivedMarkers ?? DEFAULT_DERIVED_MARKERS;
        this.wktPrecision = options.wktPrecision ?? DEFAULT_WKT_PRECISION;
        this.maxNodes = options.maxNodes ?? DEFAULT_MAX_NODES;
        this.buildIndex();
    }

    /** Parses a Turtle buffer and indexes its features. */
    static fromTurtle(turtle: string, options: SubgraphExtractorOptions = {}): GuidIndexedSubgraphExtractor {
        const quads: Quad[] = new Parser().parse(turtle);
        return new GuidIndexedSubgraphExtractor(new Store(quads), options);
    }

    get featureCount(): number {
        let count = 0;
        for (const subjects of this.guidToSubjects.values()) count += subjects.length;
        return count;
    }

    subjectsFor(guid: string): readonly string[] {
        return (this.guidToSubjects.get(guid) ?? []).map(s => s.value);
    }

    /**
     * Geometry triples of `entity`, found through its GlobalId. The feature subject is
     * replaced by `label`; everything else is written in prefixed or bracketed form.
     */
    *lookup(entity: Entity, label: string): Generator<Triple> {
        const guid = globalIdOf(entity);
        if (!guid) return;
        for (const root of this.guidToSubjects.get(guid) ?? []) {
            for (const quad of this.traverse(root)) {
                const subject = quad.subject.equals(root) ? label : this.formatTerm(quad.subject);
                yield [subject, this.formatPredicate(quad.predicate), this.formatTerm(this.normalizeObject(quad.object))];
            }
        }
    }

    private buildIndex(): void {
        const features = this.store.getSubjects(DataFactory.namedNode(RDF_TYPE), DataFactory.namedNode(FEATURE), null);
        for (const feature of features) {
            if (feature.termType !== 'NamedNode') continue;
            const guid = guidFromFeatureIri(feature.value);
            if (!guid) {
                dbg(`GuidIndexedSubgraphExtractor: no GUID in feature name ${feature.value}`);
                continue;
            }
            const subjects = this.guidToSubjects.get(guid);
            if (subjects) {
                subjects.push(feature);
            } else {
                this.guidToSubjects.set(guid, [feature]);
            }
        }
        dbg(`GuidIndexedSubgraphExtractor: indexed ${features.length} features under ${this.guidToSubjects.size} GUIDs`);
    }

    /** Breadth-first over resource objects, each node once. */
    private *traverse(root: NamedNode): Generator<Quad> {
        const queue: ResourceTerm[] = [root];
        const visited = new Set<string>();
        let head = 0;

        while (head < queue.length) {
            const node = queue[head++];
            const key = nodeKey(node);
            if (visited.has(key)) continue;
            if (visited.size >= this.maxNodes) {
                console.warn(`GuidIndexedSubgraphExtractor: stopped after ${this.maxNodes} nodes below ${root.value}`);
                return;
            }
            visited.add(key);

            for (const quad of this.store.getQuads(node, null, null, null)) {
                if (SKIPPED_PREDICATES.includes(quad.predicate.value)) continue;
                const object = quad.object;
                if (this.derivedMarkers.some(marker => object.value.includes(marker))) continue;

                yield quad;

                if (isResource(object) && !visited.has(nodeKey(object))) {
                    queue.push(object);
                }
            }
        }
    }

    private normalizeObject(term: Term): Term {
        if (term.termType === 'Literal' && term.datatype.value === WKT_LITERAL) {
            return DataFactory.literal(roundWkt(term.value, this.wktPrecision), term.datatype);
        }
        return term;
    }

    private formatPredicate(term: Term): string {
        return term.value === RDF_TYPE ? 'a' : this.formatTerm(term);
    }

    private formatTerm(term: Term): string {
        switch (term.termType) {
            case 'NamedNode':
                return this.formatIri(term.value);
            case 'BlankNode':
                return `_:${term.value}`;
            case 'Literal':
                return this.formatLiteral(term);
            default:
                return `<${term.value}>`;
        }
    }

    private formatIri(iri: string): string {
        for (const [prefix, namespace] of this.prefixes) {
            if (iri.startsWith(namespace)) {
                const local = iri.slice(namespace.length);
                if (PLAIN_LOCAL_RE.test(local)) return `${prefix}:${local}`;
            }
        }
        return `<${iri}>`;
    }

    private formatLiteral(term: Literal): string {
        const lexical = `"${escapeTurtleString(term.value)}"`;
        if (term.language) return `${lexical}@${term.language}`;
        const datatype = term.datatype.value;
        if (datatype === XSD_STRING || datatype === RDF_LANG_STRING) return lexical;
        return `${lexical}^^${this.formatIri(datatype)}`;
    }
}
