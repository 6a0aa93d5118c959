import { BASE_KEY, NamespaceTable, prefixEntries } from '../services/namespaces';

export const HEADER_BANNER = '# Turtle output generated by the ifc2ttl streaming writer.';

/** Triples stated by the header's ontology declaration. */
export const HEADER_TRIPLES = 2;

/**
 * Generate TTL header with metadata and namespace declarations.
 * Namespace lines follow the table order; the `BASE` entry becomes the `BASE` directive.
 */
export function writeHeader(namespaces: NamespaceTable, generatedAt: Date): string {
    const base = namespaces[BASE_KEY] ?? 'http://example.org/base#';

    const lines = [
        `${HEADER_BANNER}\n`,
        `# Generated on: ${generatedAt.toISOString()}\n`,
        `# baseURI: ${base}\n`,
        `# imports: ${namespaces.ifc}\n`,
        '\n',
        `BASE <${base}>\n`,
    ];

    for (const [prefix, uri] of prefixEntries(namespaces)) {
        lines.push(`PREFIX ${prefix}: <${uri}>\n`);
    }

    lines.push('\n');
    lines.push('inst:\ta\towl:Ontology ;\n');
    lines.push('\towl:imports\tifc: .\n\n');

    return lines.join('');
}
