/**
 * Raised when a citation document cannot be used at all: unreadable file,
 * invalid JSON, or a top-level structure that is not the expected shape.
 */
export class DocumentError extends Error {
    constructor(
        message: string,
        public readonly issues: string[] = [],
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'DocumentError';
    }
}

/**
 * Raised for invalid options such as a non-positive threshold.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}
