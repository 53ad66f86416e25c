export enum CoverageErrorCategory {
    EMPTY_INPUT = 'EMPTY_INPUT',
    DIVISION_UNDEFINED = 'DIVISION_UNDEFINED',
    MISSING_APPROACH = 'MISSING_APPROACH',
    MALFORMED_COVERAGE = 'MALFORMED_COVERAGE',
    CAMPAIGN_LAYOUT = 'CAMPAIGN_LAYOUT',
    INVALID_ARGUMENT = 'INVALID_ARGUMENT',
    INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Base class for every failure raised by the analysis pipeline
 */
export class CoverageError extends Error {
    constructor(
        message: string,
        public readonly category: CoverageErrorCategory
    ) {
        super(message);
        this.name = 'CoverageError';
    }
}

/**
 * A reducer or constructor was handed zero elements
 */
export class EmptyInputError extends CoverageError {
    constructor(message: string) {
        super(message, CoverageErrorCategory.EMPTY_INPUT);
        this.name = 'EmptyInputError';
    }
}

/**
 * A ratio has an empty denominator: an empty relcov reference set, or an
 * approach without a single non-empty trial in relscore.
 */
export class DivisionUndefinedError extends CoverageError {
    constructor(
        message: string,
        public readonly approach?: string
    ) {
        super(message, CoverageErrorCategory.DIVISION_UNDEFINED);
        this.name = 'DivisionUndefinedError';
    }
}

export type MissingApproachReason = 'not-found' | 'not-single-trial';

export class MissingApproachError extends CoverageError {
    constructor(
        public readonly approach: string,
        public readonly reason: MissingApproachReason = 'not-found'
    ) {
        super(
            reason === 'not-found'
                ? `Approach '${approach}' not found in campaign (it may have been excluded)`
                : `Approach '${approach}' must have exactly one trial to be used as an input corpus`,
            CoverageErrorCategory.MISSING_APPROACH
        );
        this.name = 'MissingApproachError';
    }
}

export class MalformedCoverageRecordError extends CoverageError {
    constructor(
        public readonly file: string,
        public readonly line: number,
        public readonly content: string,
        detail: string
    ) {
        super(`Invalid line ${file}:${line}: '${content}' (${detail})`, CoverageErrorCategory.MALFORMED_COVERAGE);
        this.name = 'MalformedCoverageRecordError';
    }
}

export class CampaignLayoutError extends CoverageError {
    constructor(message: string) {
        super(message, CoverageErrorCategory.CAMPAIGN_LAYOUT);
        this.name = 'CampaignLayoutError';
    }
}

export class InvalidArgumentError extends CoverageError {
    constructor(message: string) {
        super(message, CoverageErrorCategory.INVALID_ARGUMENT);
        this.name = 'InvalidArgumentError';
    }
}

export class ConfigError extends CoverageError {
    constructor(message: string) {
        super(message, CoverageErrorCategory.INVALID_CONFIG);
        this.name = 'ConfigError';
    }
}
