/**
 * Type definitions for reporter options
 */

export interface SpecReporterOptions {
    /**
     * Replace the default output with the spec output
     * @default true
     */
    enabled?: boolean

    /**
     * Verbose runs keep the default line-per-test output
     * @default false
     */
    verbose?: boolean

    /**
     * Trailing "with ..." segments dropped from documentation lines
     * @default ['with more details']
     */
    fillerPhrases?: readonly string[]

    /**
     * Print headers of suites that have no children
     * @default false
     */
    includeEmptySuites?: boolean
}
