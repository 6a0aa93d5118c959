export * from './errors';
export * from './model/attributeValues';
export type { GeometryModel } from './model/InMemoryModel';
export { InMemoryModel } from './model/InMemoryModel';
export { JsonLinesSource } from './model/JsonLinesSource';
export { SchemaRegistry } from './schema/SchemaRegistry';
export type { SchemaCollectionKind, SchemaMap } from './schema/schemaTypes';
export { parseSchemaMap } from './schema/schemaTypes';
export type { ValueEncoderOptions, EncodedEntity, EncodedValue } from './serializer/ValueEncoder';
export { ValueEncoder, isFloatFormat } from './serializer/ValueEncoder';
export type {
    StreamingSerializerOptions,
    SerializerMetrics,
    GeometrySubgraphs,
    Triple,
    EntityStream,
} from './serializer/StreamingSerializer';
export { StreamingSerializer } from './serializer/StreamingSerializer';
export { formatDouble, escapeTurtleString } from './serializer/turtle';
export type { NamespaceTable, NamespaceOptions } from './services/namespaces';
export { getNamespaces } from './services/namespaces';
export type { OutputSink } from './io/sinks';
export { FileSink, MemorySink } from './io/sinks';
export type { GeometryResolution, GeometryAnchor, ShapeRequest } from './geometry/GeometryDependencyResolver';
export { GeometryDependencyResolver } from './geometry/GeometryDependencyResolver';
export type { GeometryKernel } from './geometry/GeometryKernel';
export { TurtleFileKernel } from './geometry/GeometryKernel';
export type { GeometryProcessingOptions, GeometryProcessingResult } from './geometry/GeometryProcessor';
export { GeometryProcessor } from './geometry/GeometryProcessor';
export type { SubgraphExtractorOptions } from './geometry/GuidIndexedSubgraphExtractor';
export { GuidIndexedSubgraphExtractor } from './geometry/GuidIndexedSubgraphExtractor';
export { compressGuid } from './geometry/guid';
export type { ConvertOptions, ConversionMetrics } from './commands/convert';
export { convertToTurtle } from './commands/convert';
export type { FloatFormat } from './config';
