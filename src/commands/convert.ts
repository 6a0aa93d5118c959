import * as path from 'path';
import {
    DEFAULT_BUFFER_SIZE,
    DEFAULT_CONVERTER,
    DEFAULT_FLOAT_FORMAT,
    DEFAULT_SCHEMA,
    FLOAT_FORMATS,
    FloatFormat,
    STREAM_CONVERTER,
} from '../config';
import { ConfigurationError } from '../errors';
import { GeometryKernel, TurtleFileKernel } from '../geometry/GeometryKernel';
import { GeometryProcessor } from '../geometry/GeometryProcessor';
import { FileSink } from '../io/sinks';
import { InMemoryModel } from '../model/InMemoryModel';
import { JsonLinesSource } from '../model/JsonLinesSource';
import { SchemaRegistry } from '../schema/SchemaRegistry';
import { Entity } from '../model/attributeValues';
import { StreamingSerializer, GeometrySubgraphs } from '../serializer/StreamingSerializer';
import { isFloatFormat } from '../serializer/ValueEncoder';
import { getNamespaces, NamespaceOptions } from '../services/namespaces';
import { dbg, secondsSince } from '../utils';

export const CONVERTERS: readonly string[] = [STREAM_CONVERTER];

export interface ConvertOptions {
    converter?: string;
    floatFormat?: string;
    bufferSize?: number;
    /** Schema identifier used when the input has no schema header line. */
    schema?: string;
    /** Custom schema map JSON, used instead of the bundled maps. */
    schemaMap?: string;
    /** Precomputed geometry Turtle for this input. */
    geometry?: string;
    /** Takes precedence over `geometry`. */
    kernel?: GeometryKernel;
    pruneGeometry?: boolean;
    namespaces?: NamespaceOptions;
    /** Clock for the header timestamp. */
    now?: () => Date;
    /** Millisecond timer used for the timings. */
    timer?: () => number;
}

export interface GeometryMetrics {
    shapes: number;
    features: number;
    geometryEntities: number;
    obsolete: number;
    pruned: number;
    cycles: number;
}

export interface ConversionMetrics {
    inputPath: string;
    outputPath: string;
    converter: string;
    floatFormat: FloatFormat;
    schema: string;
    entitiesProcessed: number;
    triplesWritten: number;
    loadSeconds: number;
    writeSeconds: number;
    totalSeconds: number;
    geometry?: GeometryMetrics;
}

/** Checks the options that need no I/O. */
export function validateConvertOptions(options: ConvertOptions): { converter: string; floatFormat: FloatFormat } {
    const converter = options.converter ?? DEFAULT_CONVERTER;
    if (!CONVERTERS.includes(converter)) {
        throw new ConfigurationError(`Unknown converter '${converter}'. Available: ${CONVERTERS.join(', ')}`);
    }
    const floatFormat = options.floatFormat ?? DEFAULT_FLOAT_FORMAT;
    if (!isFloatFormat(floatFormat)) {
        throw new ConfigurationError(`Unknown float format '${floatFormat}'. Available: ${FLOAT_FORMATS.join(', ')}`);
    }
    const bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
    if (!Number.isSafeInteger(bufferSize) || bufferSize < 1) {
        throw new ConfigurationError(`Buffer size must be a positive integer, got ${bufferSize}`);
    }
    return { converter, floatFormat };
}

async function loadRegistry(schemaId: string, schemaMap?: string): Promise<SchemaRegistry> {
    return schemaMap ? SchemaRegistry.fromFile(schemaMap) : SchemaRegistry.forSchema(schemaId);
}

/**
 * Converts one JSON Lines entity export into a Turtle file.
 *
 * Without geometry the records are streamed straight to the output. With geometry the model is
 * loaded into memory first so geometry entities can be resolved and, on request, pruned.
 * A failed run leaves whatever was written in the output file.
 *
 * @returns Counts and timings of the run.
 */
export async function convertToTurtle(
    inputPath: string,
    outputPath: string,
    options: ConvertOptions = {}
): Promise<ConversionMetrics> {
    const { converter, floatFormat } = validateConvertOptions(options);
    const timer = options.timer ?? (() => performance.now());
    const start = timer();

    const source = JsonLinesSource.fromFile(path.resolve(inputPath));
    const schema = (await source.detectSchema()) ?? options.schema ?? DEFAULT_SCHEMA;
    const registry = await loadRegistry(schema, options.schemaMap);
    const namespaces = getNamespaces(schema, options.namespaces);
    dbg(`Converting ${inputPath} (schema ${schema}) with ${converter}`);

    let model: Iterable<Entity> | undefined;
    let subgraphs: GeometrySubgraphs | undefined;
    let geometry: GeometryMetrics | undefined;

    const kernel = options.kernel ?? (options.geometry ? new TurtleFileKernel(options.geometry) : undefined);
    if (kernel) {
        const loaded = await InMemoryModel.fromRecords(registry, source);
        const processed = await new GeometryProcessor(loaded, kernel).process({
            namespaces,
            prune: options.pruneGeometry,
        });
        model = loaded;
        subgraphs = processed.extractor;
        geometry = {
            shapes: processed.resolution.shapes.length,
            features: processed.extractor.featureCount,
            geometryEntities: processed.resolution.geometry.size,
            obsolete: processed.resolution.obsolete.length,
            pruned: processed.pruned,
            cycles: processed.resolution.cycles.length,
        };
    }
    const loadSeconds = secondsSince(start, timer);

    const serializer = new StreamingSerializer(registry, {
        namespaces,
        floatFormat,
        bufferSize: options.bufferSize,
        geometry: subgraphs,
        now: options.now,
    });

    const writeStart = timer();
    const sink = await FileSink.open(outputPath);
    const running = model ? serializer.runEntities(model, sink) : serializer.run(source, sink);
    const result = await running.finally(() => sink.close());

    return {
        inputPath: path.resolve(inputPath),
        outputPath: sink.filePath,
        converter,
        floatFormat,
        schema,
        entitiesProcessed: result.entitiesProcessed,
        triplesWritten: result.triplesWritten,
        loadSeconds,
        writeSeconds: secondsSince(writeStart, timer),
        totalSeconds: secondsSince(start, timer),
        geometry,
    };
}
