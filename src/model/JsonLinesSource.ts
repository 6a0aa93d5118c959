import * as fs from 'fs';
import * as readline from 'readline';
import { Readable } from 'stream';
import { SourceFormatError } from '../errors';

type OpenStreamFn = () => Readable;

function isRecord(raw: unknown): raw is Record<string, unknown> {
    return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

/** A `{ "schema": "..." }` line carries the schema identifier, not an entity. */
function schemaOf(raw: unknown): string | undefined {
    if (!isRecord(raw) || 'id' in raw) return undefined;
    return typeof raw.schema === 'string' && raw.schema.trim() ? raw.schema.trim() : undefined;
}

/**
 * Entity records exported by the model-access tool, one JSON object per line.
 * The optional first line `{ "schema": "IFC4" }` names the schema.
 *
 * Each iteration re-opens the stream, so the source can be read more than once.
 */
export class JsonLinesSource implements AsyncIterable<unknown> {
    constructor(private readonly openStream: OpenStreamFn, readonly description: string) {}

    static fromFile(filePath: string): JsonLinesSource {
        return new JsonLinesSource(() => fs.createReadStream(filePath, { encoding: 'utf-8' }), filePath);
    }

    /** For tests and piping: every call reads the same lines. */
    static fromLines(lines: string[], description = '<memory>'): JsonLinesSource {
        return new JsonLinesSource(() => Readable.from(lines.map(line => `${line}\n`)), description);
    }

    /** Schema identifier declared by the header line, if there is one. */
    async detectSchema(): Promise<string | undefined> {
        for await (const { value } of this.lines()) {
            return schemaOf(value);
        }
        return undefined;
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<unknown> {
        let first = true;
        for await (const { value } of this.lines()) {
            if (first) {
                first = false;
                if (schemaOf(value) !== undefined) continue;
            }
            yield value;
        }
    }

    private async *lines(): AsyncGenerator<{ lineNumber: number; value: unknown }> {
        const input = this.openStream();
        const reader = readline.createInterface({ input, crlfDelay: Infinity });
        let lineNumber = 0;
        try {
            for await (const line of reader) {
                lineNumber += 1;
                if (!line.trim()) continue;
                let value: unknown;
                try {
                    value = JSON.parse(line);
                } catch (error) {
                    throw new SourceFormatError(
                        `${this.description}: invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
                        lineNumber
                    );
                }
                yield { lineNumber, value };
            }
        } finally {
            reader.close();
            input.destroy();
        }
    }
}
