import { expect } from 'chai';
import { describe, it } from 'mocha';
import { compressGuid, guidFromFeatureIri } from '../../src/geometry/guid';
import { roundNumber, roundWkt } from '../../src/geometry/wkt';

describe('GUID compression', () => {
    it('should compress 32 hex digits into 22 characters', () => {
        expect(compressGuid('00000000000000000000000000000000')).to.equal('0'.repeat(22));
        expect(compressGuid('ffffffffffffffffffffffffffffffff')).to.equal('3' + '$'.repeat(21));
        expect(compressGuid('0123456789abcdef0123456789abcdef')).to.equal('018qLdYQlDxm4ZHMU9gytl');
    });

    it('should ignore hyphens and letter case', () => {
        expect(compressGuid('3f2504e0-4f89-11d3-9a0c-0305e82c3301')).to.equal('0$9GJWJuaHqveC0mNeB3C1');
        expect(compressGuid('3F2504E0-4F89-11D3-9A0C-0305E82C3301')).to.equal('0$9GJWJuaHqveC0mNeB3C1');
    });

    it('should return undefined for anything that is not a GUID', () => {
        expect(compressGuid('xyz')).to.be.undefined;
        expect(compressGuid('0123456789abcdef0123456789abcde')).to.be.undefined;
        expect(compressGuid('0123456789abcdef0123456789abcdeg')).to.be.undefined;
    });

    it('should take the GUID from the pieces between the first and last underscore', () => {
        expect(guidFromFeatureIri('http://example.org/geom#product_3f2504e0-4f89-11d3-9a0c-0305e82c3301_body'))
            .to.equal('0$9GJWJuaHqveC0mNeB3C1');
        expect(guidFromFeatureIri('http://example.org/geom/product_3f2504e0_4f89_11d3_9a0c_0305e82c3301_0'))
            .to.equal('0$9GJWJuaHqveC0mNeB3C1');
        expect(guidFromFeatureIri('http://example.org/geom#product_only')).to.be.undefined;
        expect(guidFromFeatureIri('http://example.org/geom#product_nothex_body')).to.be.undefined;
    });
});

describe('WKT rounding', () => {
    it('should strip trailing zeros and negative zero', () => {
        expect(roundNumber(1.0000004, 6)).to.equal('1');
        expect(roundNumber(-0.0000001, 6)).to.equal('0');
        expect(roundNumber(2.50000049, 6)).to.equal('2.5');
        expect(roundNumber(-3.1234567, 6)).to.equal('-3.123457');
        expect(roundNumber(12, 6)).to.equal('12');
    });

    it('should round every number of a geometry', () => {
        expect(roundWkt('POINT (1.0000004 -0.0000001)')).to.equal('POINT (1 0)');
        expect(roundWkt('LINESTRING Z (0 0 0, 1.5 2.25000001 3e-7)', 2)).to.equal('LINESTRING Z (0 0 0, 1.5 2.25 0)');
    });
});
