import { GeometryModel } from '../model/InMemoryModel';
import { dbg } from '../utils';
import { GeometryDependencyResolver, GeometryResolution } from './GeometryDependencyResolver';
import { GeometryKernel } from './GeometryKernel';
import { GuidIndexedSubgraphExtractor, SubgraphExtractorOptions } from './GuidIndexedSubgraphExtractor';

export interface GeometryProcessingOptions extends SubgraphExtractorOptions {
    /** Sever the geometry anchors and remove obsolete geometry entities from the model. */
    prune?: boolean;
}

export interface GeometryProcessingResult {
    extractor: GuidIndexedSubgraphExtractor;
    resolution: GeometryResolution;
    pruned: number;
}

/**
 * Resolves the geometry entities of a loaded model, asks the kernel for their Turtle and
 * indexes it by GUID for the serializer.
 */
export class GeometryProcessor {
    private readonly resolver: GeometryDependencyResolver;

    constructor(model: GeometryModel, private readonly kernel: GeometryKernel) {
        this.resolver = new GeometryDependencyResolver(model);
    }

    async process(options: GeometryProcessingOptions = {}): Promise<GeometryProcessingResult> {
        const resolution = this.resolver.resolve();
        const turtle = await this.kernel.serialize(resolution.shapes);
        const extractor = GuidIndexedSubgraphExtractor.fromTurtle(turtle, options);
        dbg(`GeometryProcessor: ${resolution.shapes.length} shapes requested, ${extractor.featureCount} features indexed`);

        const pruned = options.prune ? this.resolver.prune(resolution) : 0;
        return { extractor, resolution, pruned };
    }
}
