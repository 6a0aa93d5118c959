import { FloatFormat } from '../config';
import { Literal } from '../model/attributeValues';

export function escapeTurtleString(value: string): string {
    return value
        .replace(/\\/g, '\\\\')
        .replace(/\"/g, '\\"')
        .replace(/\r/g, '\\r')
        .replace(/\n/g, '\\n');
}

/**
 * Lexical form of a double.
 *
 * `scientific` keeps 15 digits after the mantissa point and writes the exponent without
 * `+` or leading zeros: 0.584 becomes `5.840000000000000E-1`.
 * `plain` is the shortest decimal that reads back to the same number; integral values
 * keep one fractional digit (`5.0`).
 */
export function formatDouble(value: number, format: FloatFormat): string {
    if (Number.isNaN(value)) return 'NaN';
    if (value === Infinity) return 'INF';
    if (value === -Infinity) return '-INF';

    // toExponential, toFixed and String all drop the sign of -0
    const sign = Object.is(value, -0) ? '-' : '';
    if (format === 'scientific') {
        return sign + value.toExponential(15).toUpperCase().replace('E+', 'E');
    }
    if (Number.isInteger(value) && Math.abs(value) < 1e16) {
        return sign + value.toFixed(1);
    }
    return String(value);
}

export function formatLiteral(literal: Literal, floatFormat: FloatFormat): string {
    switch (literal.kind) {
        case 'string':
            return `"${escapeTurtleString(literal.value)}"`;
        case 'boolean':
            return `"${literal.value ? 'true' : 'false'}"^^xsd:boolean`;
        case 'integer':
            return `"${literal.value}"^^xsd:integer`;
        case 'float':
            return `"${formatDouble(literal.value, floatFormat)}"^^xsd:double`;
    }
}

export function instanceRef(id: number | string): string {
    return `inst:ref_${id}`;
}
