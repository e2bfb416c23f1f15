/**
 * Type definitions for the spec tree
 */

export type NodeKind = 'suite' | 'example';

export type Outcome = 'passed' | 'failed' | 'skipped';

/**
 * One node of a collected test forest, as handed over by the test runner adapter.
 * Suites hold children, examples hold an outcome.
 */
export interface SpecNode {
    readonly identifier:     string
    readonly kind:           NodeKind
    /**
     * Free text attached to the node; only its first line is ever displayed
     */
    readonly documentation?: string
    /**
     * Explicit description attached by an override helper; always wins
     */
    readonly override?:      string
    readonly children?:      readonly SpecNode[]
    readonly outcome?:       Outcome
}

export type SuiteRole = 'object' | 'with' | 'without' | 'when' | 'unclassified';

export type ExampleRole = 'example';

export type Role = SuiteRole | ExampleRole;

export interface Classification {
    role:     Role
    /**
     * Identifier with the recognised prefix removed (verbatim when unclassified)
     */
    stripped: string
}

export interface RenderedExample {
    phrase:  string
    outcome: Outcome
}

export interface RenderBlock {
    /**
     * Ancestor phrases not yet printed, outermost first
     */
    headerPath: string[]
    /**
     * Number of ancestor headers already current when this block starts
     */
    depth:      number
    example?:   RenderedExample
}

export interface TestSummary {
    passed:  number
    failed:  number
    skipped: number
    total:   number
}
