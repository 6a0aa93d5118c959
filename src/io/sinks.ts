import * as fs from 'fs/promises';
import * as path from 'path';

/** Where the serializer writes. One run owns its sink exclusively. */
export interface OutputSink {
    write(chunk: string): Promise<void>;
}

/** Writes to a file, truncating it on open. */
export class FileSink implements OutputSink {
    private constructor(private readonly handle: fs.FileHandle, readonly filePath: string) {}

    static async open(filePath: string): Promise<FileSink> {
        const resolved = path.resolve(filePath);
        const handle = await fs.open(resolved, 'w');
        return new FileSink(handle, resolved);
    }

    async write(chunk: string): Promise<void> {
        await this.handle.write(chunk, null, 'utf-8');
    }

    async close(): Promise<void> {
        await this.handle.close();
    }
}

/** Keeps every chunk in memory. */
export class MemorySink implements OutputSink {
    readonly chunks: string[] = [];

    async write(chunk: string): Promise<void> {
        this.chunks.push(chunk);
    }

    toString(): string {
        return this.chunks.join('');
    }
}
