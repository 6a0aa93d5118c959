import * as dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

function envString(key: string, defaultValue: string): string {
    const v = process.env[key];
    if (typeof v === 'string' && v.trim()) return v.trim();
    return defaultValue;
}

function envInt(key: string, defaultValue: number): number {
    const raw = process.env[key];
    const n = raw != null ? Number(String(raw).trim()) : NaN;
    return Number.isFinite(n) && n > 0 ? Math.trunc(n) : defaultValue;
}

// Default paths and constants
export const DEFAULT_BASE_URI = envString('IFC2TTL_BASE_URI', 'http://example.org/base#');
export const DEFAULT_INSTANCE_NAMESPACE = envString('IFC2TTL_INSTANCE_NS', 'http://example.org/ifc/instances#');
// `{schema}` is replaced by the detected schema identifier, e.g. IFC4X3_ADD2
export const DEFAULT_SCHEMA_NAMESPACE_TEMPLATE = envString(
    'IFC2TTL_SCHEMA_NS',
    'https://standards.buildingsmart.org/IFC/DEV/{schema}/OWL#'
);
export const DEFAULT_SCHEMA = envString('IFC2TTL_DEFAULT_SCHEMA', 'IFC4X3_ADD2');

/** Number of entities held in memory before the output buffer is flushed. */
export const DEFAULT_BUFFER_SIZE = envInt('IFC2TTL_BUFFER_SIZE', 100000);

export const STREAM_CONVERTER = 'mini_ifcowl_stream';
export const DEFAULT_CONVERTER = STREAM_CONVERTER;

export const FLOAT_FORMATS = ['scientific', 'plain'] as const;
export type FloatFormat = (typeof FLOAT_FORMATS)[number];
export const DEFAULT_FLOAT_FORMAT: FloatFormat = 'scientific';

export const TURTLE_EXTENSION = '.ttl';
export const INPUT_EXTENSIONS = ['.jsonl', '.ndjson'];
