/**
 * Command line program
 * Reads a Bun result file (JUnit XML or console output) and prints it as a spec
 */

import { readFile } from 'node:fs/promises';
import { Command, CommanderError, Option } from 'commander';
import { readConfig } from '../config/config-reader.js';
import type { SpecReporterConfig } from '../config/config-schema.js';
import { ConfigError } from '../errors.js';
import { createLogger, LOG_LEVELS, setLogLevel, type LogLevel } from '../logging.js';
import { colorizeLine, createPainter } from '../output/colorize.js';
import { formatSummary, renderDefault } from '../output/default-output.js';
import { attachOverrides } from '../overrides.js';
import { parseBunTestOutput } from '../parsers/console-parser.js';
import { parseJunitXml } from '../parsers/junit-parser.js';
import { SpecReporter, summarize } from '../spec-reporter.js';
import type { SpecNode } from '../types.js';

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_USAGE = 2;

export type InputFormat = 'junit' | 'console';

export interface CliIo {
    stdout:    (text: string) => void
    stderr:    (text: string) => void
    readInput: (file: string | undefined) => Promise<string>
    cwd:       string
}

interface CliOptions {
    format?:             InputFormat
    config?:             string
    verbose?:            boolean
    color?:              boolean
    spec?:               boolean
    includeEmptySuites?: boolean
    logLevel?:           LogLevel
}

async function readStdin(): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf8');
}

export const processIo: CliIo = {
    stdout:    text => process.stdout.write(text),
    stderr:    text => process.stderr.write(text),
    readInput: file => (file ? readFile(file, 'utf8') : readStdin()),
    cwd:       process.cwd(),
};

/**
 * JUnit XML starts with a tag; anything else is treated as console output
 */
export function detectFormat(input: string): InputFormat {
    return input.trimStart().startsWith('<') ? 'junit' : 'console';
}

export function parseInput(input: string, format: InputFormat): SpecNode[] {
    return format === 'junit' ? parseJunitXml(input) : parseBunTestOutput(input);
}

/**
 * Flags given on the command line win over the config file
 */
export function mergeOptions(config: SpecReporterConfig, options: CliOptions): SpecReporterConfig {
    return {
        ...config,
        enabled:            options.spec ?? config.enabled,
        verbose:            options.verbose ?? config.verbose,
        color:              options.color ?? config.color,
        includeEmptySuites: options.includeEmptySuites ?? config.includeEmptySuites,
        logLevel:           options.logLevel ?? config.logLevel,
    };
}

async function execute(file: string | undefined, options: CliOptions, io: CliIo): Promise<number> {
    const config = mergeOptions(await readConfig(io.cwd, options.config), options);
    setLogLevel(config.logLevel);
    const logger = createLogger('cli');

    const input = await io.readInput(file);
    const format = options.format ?? detectFormat(input);
    const forest = attachOverrides(parseInput(input, format), config.overrides);
    logger.debug('Parsed %d root nodes from %s input', forest.length, format);

    const reporter = new SpecReporter(createLogger('spec-reporter'), config);
    const lines = reporter.reportLines(forest);
    const summary = summarize(forest);

    if(lines) {
        const paint = createPainter(config.color);
        for(const line of lines) {
            io.stdout(`${colorizeLine(line, paint)}\n`);
        }
    } else {
        for(const line of renderDefault(forest)) {
            io.stdout(`${line}\n`);
        }
    }
    io.stdout(`\n${formatSummary(summary)}\n`);

    return summary.failed > 0 ? EXIT_FAILURES : EXIT_OK;
}

export function createProgram(io: CliIo, onExit: (code: number) => void): Command {
    const program = new Command();

    program
        .name('bun-spec-reporter')
        .description('Print Bun test results as a nested, RSpec-style specification')
        .argument('[file]', 'JUnit XML or console output file (reads stdin when omitted)')
        .addOption(new Option('-f, --format <format>', 'input format (detected when omitted)').choices(['junit', 'console']))
        .option('-c, --config <path>', 'config file (default: spec-reporter.config.json)')
        .option('-v, --verbose', 'print the plain line-per-test output')
        .option('--spec', 'print the spec output')
        .option('--no-spec', 'disable the spec output')
        .option('--color', 'colour the output')
        .option('--no-color', 'disable colours')
        .option('--include-empty-suites', 'print headers of suites without tests')
        .addOption(new Option('--log-level <level>', 'diagnostic log level (stderr)').choices(LOG_LEVELS))
        .exitOverride()
        .configureOutput({
            writeOut: text => io.stdout(text),
            writeErr: text => io.stderr(text),
        })
        .action(async (file: string | undefined, options: CliOptions) => {
            onExit(await execute(file, options, io));
        });

    return program;
}

/**
 * Run the program and return its exit code
 */
export async function run(argv: readonly string[], io: CliIo = processIo): Promise<number> {
    let exitCode = EXIT_OK;
    const program = createProgram(io, (code) => {
        exitCode = code;
    });

    try {
        await program.parseAsync([...argv], { from: 'user' });
        return exitCode;
    } catch (error) {
        if(error instanceof CommanderError) {
            return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
        }
        if(error instanceof ConfigError) {
            io.stderr(`${error.message}\n`);
            return EXIT_USAGE;
        }
        if(error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            io.stderr(`${error.message}\n`);
            return EXIT_USAGE;
        }
        throw error;
    }
}
