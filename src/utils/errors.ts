/**
 * Error types raised while ingesting labels and pileups
 */

export class IngestError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly context?: string
    ) {
        super(message);
        this.name = 'IngestError';
    }

    override toString(): string {
        let msg = `${this.name}: ${this.message}`;
        if (this.context) {
            msg += `\nContext: ${this.context}`;
        }
        return msg;
    }
}

/**
 * Bad inputs detected before or at the start of processing: unindexed VCF
 * paths, wrong sample counts, region bounds outside the coordinate space.
 */
export class ConfigurationError extends IngestError {
    constructor(message: string, context?: string) {
        super(message, 'CONFIGURATION_ERROR', context);
        this.name = 'ConfigurationError';
    }
}

/**
 * A record reached a stage with a shape that stage cannot handle.
 */
export class InvariantViolationError extends IngestError {
    constructor(message: string, context?: string) {
        super(message, 'INVARIANT_VIOLATION', context);
        this.name = 'InvariantViolationError';
    }
}

export class PileupGrammarError extends InvariantViolationError {
    constructor(
        message: string,
        public readonly column: string,
        public readonly offset: number
    ) {
        super(`${message} at offset ${offset}`, column);
        this.name = 'PileupGrammarError';
    }
}
