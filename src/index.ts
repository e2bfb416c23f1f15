/**
 * bun-spec-reporter
 * Public API: description derivation, tree consolidation and rendering
 */

export { classify, SUITE_PREFIXES, EXAMPLE_PREFIXES } from './description/classifier.js';
export {
    splitWords,
    formatWords,
    formatPhrase,
    legibleFallback,
    selectArticle,
    COMMON_WORDS
} from './description/phrase-formatter.js';
export {
    DescriptionResolver,
    firstDocumentationLine,
    DEFAULT_FILLER_PHRASES,
    UNNAMED_PHRASE,
    type DescriptionResolverOptions
} from './description/resolver.js';
export { TreeConsolidator, type TreeConsolidatorOptions } from './tree/consolidator.js';
export { validateForest } from './tree/validate.js';
export { render, renderLines, STATUS_GLYPHS, type RenderedLine } from './output/renderer.js';
export { renderDefault, formatSummary } from './output/default-output.js';
export { SpecReporter, shouldFormat, summarize } from './spec-reporter.js';
export { describeAs, withAs, withoutAs, whenAs, itAs, attachOverrides } from './overrides.js';
export { parseJunitXml } from './parsers/junit-parser.js';
export { parseBunTestOutput } from './parsers/console-parser.js';
export { readConfig, parseConfig, CONFIG_FILE_NAME } from './config/config-reader.js';
export { SpecReporterConfigSchema, type SpecReporterConfig } from './config/config-schema.js';
export { createLogger, setLogLevel, type Logger, type LogLevel } from './logging.js';
export * from './errors.js';
export type * from './types.js';
export type * from './options.js';
