const GUID_CHARS = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz_$';

const HEX_GUID_RE = /^[0-9a-fA-F]{32}$/;

function toBase64(value: number, length: number): string {
    let out = '';
    let rest = value;
    for (let i = 0; i < length; i++) {
        out = GUID_CHARS[rest % 64] + out;
        rest = Math.floor(rest / 64);
    }
    return out;
}

/**
 * Compresses a 128-bit GUID given as 32 hex digits (hyphens allowed) into the
 * 22-character IFC GlobalId form. Returns `undefined` when the input is not a GUID.
 */
export function compressGuid(hex: string): string | undefined {
    const digits = hex.replace(/-/g, '');
    if (!HEX_GUID_RE.test(digits)) return undefined;

    const bytes: number[] = [];
    for (let i = 0; i < 32; i += 2) {
        bytes.push(parseInt(digits.slice(i, i + 2), 16));
    }

    const parts = [toBase64(bytes[0], 2)];
    for (let i = 1; i < 16; i += 3) {
        parts.push(toBase64(bytes[i] * 65536 + bytes[i + 1] * 256 + bytes[i + 2], 4));
    }
    return parts.join('');
}

/**
 * GUID carried in the name of a geometry feature subject. The kernel names features
 * `<kind>_<guid pieces...>_<suffix>`, so the pieces between the first and last
 * underscore are the GUID.
 */
export function guidFromFeatureIri(iri: string): string | undefined {
    const cut = Math.max(iri.lastIndexOf('/'), iri.lastIndexOf('#'));
    const name = iri.slice(cut + 1);
    const pieces = name.split('_');
    if (pieces.length < 3) return undefined;
    return compressGuid(pieces.slice(1, -1).join(''));
}
