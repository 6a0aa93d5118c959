import * as fs from 'fs/promises';
import { dbg } from '../utils';
import { ShapeRequest } from './GeometryDependencyResolver';

/**
 * Turns product shapes into a geometry Turtle buffer, one `geo:Feature` per product named
 * after the product's GUID. Triangulation happens outside this project.
 */
export interface GeometryKernel {
    serialize(requests: readonly ShapeRequest[]): Promise<string>;
}

type ReadFileFn = (filePath: string) => Promise<string>;

/** Serves geometry Turtle that a kernel run wrote to disk beforehand. */
export class TurtleFileKernel implements GeometryKernel {
    constructor(
        readonly filePath: string,
        private readonly readFile: ReadFileFn = (p: string) => fs.readFile(p, 'utf-8')
    ) {}

    async serialize(requests: readonly ShapeRequest[]): Promise<string> {
        dbg(`TurtleFileKernel: reading geometry for ${requests.length} shapes from ${this.filePath}`);
        return this.readFile(this.filePath);
    }
}
