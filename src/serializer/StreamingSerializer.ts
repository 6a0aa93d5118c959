import { DEFAULT_BUFFER_SIZE } from '../config';
import { ConfigurationError, FatalEncodingError } from '../errors';
import { OutputSink } from '../io/sinks';
import { Entity, parseEntityRecord } from '../model/attributeValues';
import { SchemaRegistry } from '../schema/SchemaRegistry';
import { NamespaceTable } from '../services/namespaces';
import { dbg } from '../utils';
import { HEADER_TRIPLES, writeHeader } from './header';
import { instanceRef } from './turtle';
import { ValueEncoder, ValueEncoderOptions } from './ValueEncoder';

export type Triple = [subject: string, predicate: string, object: string];

/** Supplies the geometry triples of an entity, with the root subject renamed to `label`. */
export interface GeometrySubgraphs {
    lookup(entity: Entity, label: string): Iterable<Triple>;
}

export interface SerializerMetrics {
    entitiesProcessed: number;
    triplesWritten: number;
}

export interface StreamingSerializerOptions extends ValueEncoderOptions {
    namespaces: NamespaceTable;
    /** Entities held before the buffer is written to the sink. */
    bufferSize?: number;
    geometry?: GeometrySubgraphs;
    /** Clock for the header timestamp. */
    now?: () => Date;
}

type SerializerState = 'header-pending' | 'streaming' | 'done';

export type EntityStream = Iterable<unknown> | AsyncIterable<unknown>;

async function* parseRecords(records: EntityStream): AsyncGenerator<Entity> {
    let skipped = 0;
    for await (const record of records) {
        const entity = parseEntityRecord(record);
        if (entity) {
            yield entity;
        } else {
            skipped += 1;
        }
    }
    if (skipped > 0) dbg(`StreamingSerializer: skipped ${skipped} malformed records`);
}

/**
 * Single-pass writer from an entity record stream to Turtle.
 *
 * Writes the header, then one block per entity in stream order, each followed by the
 * statements of its typed values and, when geometry is configured, its geometry subgraph.
 * Buffering only batches writes; the bytes written do not depend on the buffer size.
 */
export class StreamingSerializer {
    private state: SerializerState = 'header-pending';
    private readonly encoder: ValueEncoder;
    private readonly bufferSize: number;
    private readonly namespaces: NamespaceTable;
    private readonly geometry?: GeometrySubgraphs;
    private readonly now: () => Date;

    constructor(registry: SchemaRegistry, options: StreamingSerializerOptions) {
        const bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
        if (!Number.isSafeInteger(bufferSize) || bufferSize < 1) {
            throw new ConfigurationError(`Buffer size must be a positive integer, got ${bufferSize}`);
        }
        this.bufferSize = bufferSize;
        this.encoder = new ValueEncoder(registry, options);
        this.namespaces = options.namespaces;
        this.geometry = options.geometry;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Consumes raw `records` once and writes everything to `sink`. Malformed records are skipped.
     * @throws FatalEncodingError when an entity cannot be encoded; entities completed before it are written.
     */
    async run(records: EntityStream, sink: OutputSink): Promise<SerializerMetrics> {
        return this.runEntities(parseRecords(records), sink);
    }

    /** Same as `run()` for entities that are already parsed, e.g. a loaded model. */
    async runEntities(entities: Iterable<Entity> | AsyncIterable<Entity>, sink: OutputSink): Promise<SerializerMetrics> {
        if (this.state !== 'header-pending') {
            throw new Error('StreamingSerializer: run() may only be called once per instance.');
        }

        await sink.write(writeHeader(this.namespaces, this.now()));
        this.state = 'streaming';

        const metrics: SerializerMetrics = { entitiesProcessed: 0, triplesWritten: HEADER_TRIPLES };
        let buffer: string[] = [];
        let buffered = 0;

        for await (const entity of entities) {
            let output: string;
            let triples: number;
            try {
                ({ output, triples } = this.encodeEntity(entity));
            } catch (error) {
                if (buffer.length > 0) {
                    await sink.write(buffer.join(''));
                }
                this.state = 'done';
                throw new FatalEncodingError(entity.id, error);
            }

            metrics.entitiesProcessed += 1;
            metrics.triplesWritten += triples;
            buffer.push(output);
            buffered += 1;

            if (buffered >= this.bufferSize) {
                await sink.write(buffer.join(''));
                dbg(`StreamingSerializer: flushed ${buffered} entities`);
                buffer = [];
                buffered = 0;
            }
        }

        if (buffer.length > 0) {
            await sink.write(buffer.join(''));
        }
        this.state = 'done';
        dbg(`StreamingSerializer: wrote ${metrics.entitiesProcessed} entities, ${metrics.triplesWritten} triples`);
        return metrics;
    }

    private encodeEntity(entity: Entity): { output: string; triples: number } {
        const encoded = this.encoder.encodeEntity(entity);
        let output = encoded.block + encoded.auxiliary.join('');
        let triples = encoded.triples;

        if (this.geometry) {
            const lines: string[] = [];
            for (const [s, p, o] of this.geometry.lookup(entity, instanceRef(entity.id))) {
                lines.push(`${s} ${p} ${o} .\n`);
            }
            if (lines.length > 0) {
                output += lines.join('') + '\n';
                triples += lines.length;
            }
        }
        return { output, triples };
    }
}
