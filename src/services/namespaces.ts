import {
    DEFAULT_BASE_URI,
    DEFAULT_INSTANCE_NAMESPACE,
    DEFAULT_SCHEMA_NAMESPACE_TEMPLATE,
} from '../config';

/**
 * Ordered prefix -> namespace table. The `BASE` key holds the base URI and is never
 * written as a prefix.
 */
export type NamespaceTable = Record<string, string>;

export const BASE_KEY = 'BASE';
export const GEOSPARQL_NAMESPACE = 'http://www.opengis.net/ont/geosparql#';

export interface NamespaceOptions {
    baseUri?: string;
    instanceNamespace?: string;
    /** Model-schema namespace; `{schema}` is replaced with the schema identifier. */
    schemaNamespaceTemplate?: string;
}

export function schemaNamespace(schemaId: string, template = DEFAULT_SCHEMA_NAMESPACE_TEMPLATE): string {
    return template.split('{schema}').join(schemaId);
}

/**
 * Namespaces for one conversion, in header order.
 * @param schemaId - Detected schema identifier, e.g. `IFC4X3_ADD2`.
 */
export function getNamespaces(schemaId: string, options: NamespaceOptions = {}): NamespaceTable {
    return {
        [BASE_KEY]: options.baseUri ?? DEFAULT_BASE_URI,
        ifc: schemaNamespace(schemaId, options.schemaNamespaceTemplate),
        inst: options.instanceNamespace ?? DEFAULT_INSTANCE_NAMESPACE,
        rdf: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#',
        rdfs: 'http://www.w3.org/2000/01/rdf-schema#',
        xsd: 'http://www.w3.org/2001/XMLSchema#',
        owl: 'http://www.w3.org/2002/07/owl#',
        geo: GEOSPARQL_NAMESPACE,
    };
}

/** The table without its `BASE` entry, in order. */
export function prefixEntries(namespaces: NamespaceTable): Array<[string, string]> {
    return Object.entries(namespaces).filter(([prefix]) => prefix !== BASE_KEY);
}
