import { expect } from 'chai';
import { describe, it, before, after } from 'mocha';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SourceFormatError } from '../../src/errors';
import { JsonLinesSource } from '../../src/model/JsonLinesSource';

async function collect(source: AsyncIterable<unknown>): Promise<unknown[]> {
    const out: unknown[] = [];
    for await (const record of source) out.push(record);
    return out;
}

describe('JsonLinesSource', () => {
    it('should read the schema header and leave it out of the records', async () => {
        const source = JsonLinesSource.fromLines([
            '{"schema": "IFC2X3"}',
            '{"id": 1, "type": "IfcWall"}',
            '',
            '{"id": 2, "type": "IfcSlab"}',
        ]);
        expect(await source.detectSchema()).to.equal('IFC2X3');
        expect(await collect(source)).to.deep.equal([
            { id: 1, type: 'IfcWall' },
            { id: 2, type: 'IfcSlab' },
        ]);
    });

    it('should treat a first line with an id as a record', async () => {
        const source = JsonLinesSource.fromLines(['{"id": 1, "type": "IfcWall", "schema": "IFC4"}']);
        expect(await source.detectSchema()).to.be.undefined;
        expect(await collect(source)).to.deep.equal([{ id: 1, type: 'IfcWall', schema: 'IFC4' }]);
    });

    it('should hand non-object lines through for the consumer to drop', async () => {
        const source = JsonLinesSource.fromLines(['[1, 2]', '"text"']);
        expect(await collect(source)).to.deep.equal([[1, 2], 'text']);
    });

    it('should report unparsable lines with their line number', async () => {
        const source = JsonLinesSource.fromLines(['{"id": 1, "type": "IfcWall"}', '', '{"id": 2,'], 'broken.jsonl');
        try {
            await collect(source);
            expect.fail('Should have thrown');
        } catch (error) {
            expect(error).to.be.instanceOf(SourceFormatError);
            if (error instanceof SourceFormatError) {
                expect(error.lineNumber).to.equal(3);
                expect(error.message).to.match(/^broken\.jsonl: invalid JSON: .* \(line 3\)$/);
            }
        }
    });

    describe('fromFile', () => {
        let dir: string;

        before(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'jsonl-source-'));
        });

        after(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('should read a file as often as asked', async () => {
            const file = path.join(dir, 'model.jsonl');
            fs.writeFileSync(file, '{"schema":"IFC4"}\r\n{"id":7,"type":"IfcDoor"}\r\n');
            const source = JsonLinesSource.fromFile(file);
            expect(await source.detectSchema()).to.equal('IFC4');
            expect(await collect(source)).to.deep.equal([{ id: 7, type: 'IfcDoor' }]);
            expect(await collect(source)).to.deep.equal([{ id: 7, type: 'IfcDoor' }]);
        });
    });
});
