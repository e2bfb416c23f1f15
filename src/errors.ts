/**
 * Error types raised by the reporter
 */

export class SpecReporterError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Raised by the phrase formatter when an identifier yields no words.
 * The description resolver always recovers from it.
 */
export class EmptyPhraseError extends SpecReporterError {
    constructor(public readonly input: string) {
        super(`No words to format in "${input}"`);
    }
}

/**
 * The collected forest breaks the suite/example contract
 */
export class MalformedTreeError extends SpecReporterError {
    constructor(public readonly path: readonly string[], reason: string) {
        super(`Malformed test tree at "${path.join(' > ')}": ${reason}`);
    }
}

export class InvalidOverrideError extends SpecReporterError {}

export class ConfigError extends SpecReporterError {
    constructor(
        public readonly file: string,
        message: string,
        public readonly issues: readonly string[] = []
    ) {
        super(issues.length > 0 ? `${message} (${file}):\n  ${issues.join('\n  ')}` : `${message} (${file})`);
    }
}
