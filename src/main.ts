#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import {
    DEFAULT_BUFFER_SIZE,
    DEFAULT_CONVERTER,
    DEFAULT_FLOAT_FORMAT,
    DEFAULT_SCHEMA,
    INPUT_EXTENSIONS,
    TURTLE_EXTENSION,
} from './config';
import { ConversionMetrics, convertToTurtle, validateConvertOptions } from './commands/convert';
import { describeError } from './errors';
import { dbg, say, setDebug } from './utils';

const GENERAL_ERROR = 1;
const CONVERSION_ERROR = 2;
const COMMAND_PARSING_ERROR = 4;
const UNHANDLED_ERROR = 5;

export interface ConvertCliOptions {
    input: string[];
    output: string[];
    converter: string;
    floatFormat: string;
    bufferSize: number;
    schema: string;
    schemaMap?: string;
    geometry?: string[];
    pruneGeometry?: boolean;
    benchmark?: boolean;
    verbose?: boolean;
}

function parsePositiveInt(value: string): number {
    const n = Number(value);
    if (!Number.isSafeInteger(n) || n < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return n;
}

/** Problems with the file arguments; empty when the run can go ahead. */
export function validateFileArguments(options: ConvertCliOptions, exists: (p: string) => boolean = fs.existsSync): string[] {
    const problems: string[] = [];
    if (options.input.length !== options.output.length) {
        problems.push(`Got ${options.input.length} input files but ${options.output.length} output files.`);
    }
    for (const output of options.output) {
        if (path.extname(output).toLowerCase() !== TURTLE_EXTENSION) {
            problems.push(`Output file '${output}' must end in ${TURTLE_EXTENSION}.`);
        }
    }
    if (options.geometry && options.geometry.length !== options.input.length) {
        problems.push(`Got ${options.input.length} input files but ${options.geometry.length} geometry files.`);
    }
    if (options.pruneGeometry && !options.geometry) {
        problems.push('--prune-geometry needs --geometry.');
    }
    for (const input of options.input) {
        if (!exists(input)) {
            problems.push(`Input file '${input}' does not exist.`);
        } else if (!INPUT_EXTENSIONS.includes(path.extname(input).toLowerCase())) {
            console.warn(`Warning: '${input}' does not look like a JSON Lines export (${INPUT_EXTENSIONS.join(', ')}).`);
        }
    }
    return problems;
}

export function formatBenchmark(metrics: ConversionMetrics): string {
    const rate = metrics.totalSeconds > 0 ? Math.round(metrics.triplesWritten / metrics.totalSeconds) : 0;
    const lines = [
        `Benchmark for ${metrics.inputPath}`,
        `  converter:     ${metrics.converter} (${metrics.floatFormat} floats, schema ${metrics.schema})`,
        `  entities:      ${metrics.entitiesProcessed}`,
        `  triples:       ${metrics.triplesWritten}`,
        `  load time:     ${metrics.loadSeconds.toFixed(3)} s`,
        `  write time:    ${metrics.writeSeconds.toFixed(3)} s`,
        `  total time:    ${metrics.totalSeconds.toFixed(3)} s`,
        `  throughput:    ${rate} triples/s`,
    ];
    if (metrics.geometry) {
        lines.push(
            `  geometry:      ${metrics.geometry.features} features for ${metrics.geometry.shapes} shapes, ` +
            `${metrics.geometry.pruned} entities pruned`
        );
    }
    return lines.join('\n');
}

/** Converts every input; returns the number of failed files. */
async function runConvert(options: ConvertCliOptions): Promise<number> {
    let failures = 0;
    for (const [index, input] of options.input.entries()) {
        const output = options.output[index];
        try {
            const metrics = await convertToTurtle(input, output, {
                converter: options.converter,
                floatFormat: options.floatFormat,
                bufferSize: options.bufferSize,
                schema: options.schema,
                schemaMap: options.schemaMap,
                geometry: options.geometry?.[index],
                pruneGeometry: options.pruneGeometry,
            });
            say(`Converted '${input}' -> '${output}' (${metrics.entitiesProcessed} entities, ${metrics.triplesWritten} triples)`);
            if (options.benchmark) {
                say(formatBenchmark(metrics));
            }
        } catch (error) {
            failures += 1;
            console.error(`Error converting '${input}': ${describeError(error)}`);
        }
    }
    return failures;
}

async function main() {
    const program = new Command();

    program
        .name('ifc2ttl')
        .version('1.0.0')
        .description('Convert building model entity exports to Turtle');

    program
        .command('convert')
        .description('Convert JSON Lines entity exports to Turtle files')
        .requiredOption('-i, --input <files...>', 'Input JSON Lines files')
        .requiredOption('-o, --output <files...>', 'Output Turtle files, one per input')
        .option('--converter <name>', 'Converter to use', DEFAULT_CONVERTER)
        .option('--float-format <format>', 'Float literal format: scientific or plain', DEFAULT_FLOAT_FORMAT)
        .option('--buffer-size <entities>', 'Entities buffered between writes', parsePositiveInt, DEFAULT_BUFFER_SIZE)
        .option('--schema <id>', 'Schema used when the input declares none', DEFAULT_SCHEMA)
        .option('--schema-map <path>', 'Custom schema map JSON file')
        .option('--geometry <files...>', 'Precomputed geometry Turtle files, one per input')
        .option('--prune-geometry', 'Remove geometry entities made redundant by the geometry triples')
        .option('--benchmark', 'Print timings and throughput per file')
        .option('--verbose', 'Print debug output')
        .action(async (options: ConvertCliOptions) => {
            if (options.verbose) setDebug(true);
            try {
                validateConvertOptions({
                    converter: options.converter,
                    floatFormat: options.floatFormat,
                    bufferSize: options.bufferSize,
                });
            } catch (error) {
                console.error(`Error: ${describeError(error)}`);
                process.exit(GENERAL_ERROR);
            }
            const problems = validateFileArguments(options);
            if (problems.length > 0) {
                problems.forEach(problem => console.error(`Error: ${problem}`));
                process.exit(GENERAL_ERROR);
            }

            const failures = await runConvert(options);
            if (failures > 0) {
                dbg(`${failures} of ${options.input.length} conversions failed`);
                process.exit(CONVERSION_ERROR);
            }
        });

    try {
        if (process.argv.length <= 2) {
            program.help();
        }
        await program.parseAsync(process.argv);
    } catch (error) {
        dbg(`Error during command parsing or execution: ${error}`);
        process.exit(COMMAND_PARSING_ERROR);
    }
}

if (require.main === module) {
    main().catch(error => {
        console.error(`Unhandled application error: ${describeError(error)}`);
        process.exit(UNHANDLED_ERROR);
    });
}
