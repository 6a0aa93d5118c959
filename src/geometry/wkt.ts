const NUMBER_RE = /[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?/g;

export const DEFAULT_WKT_PRECISION = 6;

export function roundNumber(value: number, digits: number): string {
    const fixed = value.toFixed(digits);
    const trimmed = fixed.includes('.') ? fixed.replace(/0+$/, '').replace(/\.$/, '') : fixed;
    return trimmed === '' || trimmed === '-0' ? '0' : trimmed;
}

/**
 * Rounds every number in a well-known-text geometry so that kernel formatting noise
 * does not leak into the output: `POINT (1.0000004 -0.0000001)` becomes `POINT (1 0)`.
 */
export function roundWkt(wkt: string, digits = DEFAULT_WKT_PRECISION): string {
    return wkt.replace(NUMBER_RE, match => roundNumber(Number(match), digits));
}
