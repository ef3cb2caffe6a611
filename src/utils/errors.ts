/**
 * Error taxonomy for the collection and scoring pipeline.
 *
 * Failures local to one seed point or one classification batch are contained
 * by the stage that raised them. Only the corpus-wide errors at the bottom of
 * this file abort a run.
 */

/**
 * A listing query failed in a way worth retrying (timeouts, 429, 5xx).
 */
export class TransientSourceError extends Error {
    constructor(
        message: string,
        public readonly seedIndex: number,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'TransientSourceError';
    }
}

/**
 * A listing query failed for good; the seed point is marked failed.
 */
export class PersistentSourceError extends Error {
    constructor(
        message: string,
        public readonly seedIndex: number,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'PersistentSourceError';
    }
}

/**
 * A classification batch failed or could not be parsed.
 */
export class ClassificationBatchError extends Error {
    constructor(
        message: string,
        public readonly batchIndex: number,
        public readonly keys: readonly string[],
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'ClassificationBatchError';
    }
}

/**
 * An entity-level data problem. Entities carrying one are excluded from
 * training and shown with a caveat.
 */
export class DataQualityError extends Error {
    constructor(
        message: string,
        public readonly key: string,
        public readonly caveat: string
    ) {
        super(message);
        this.name = 'DataQualityError';
    }
}

/**
 * No rows are usable for training. Fatal.
 */
export class InsufficientTrainingDataError extends Error {
    constructor(message: string, public readonly usableRows: number) {
        super(message);
        this.name = 'InsufficientTrainingDataError';
    }
}

/**
 * The merged configuration failed validation. Fatal.
 */
export class ConfigError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Cancellation was observed between units of work.
 */
export class PipelineAbortedError extends Error {
    constructor(message = 'Pipeline aborted') {
        super(message);
        this.name = 'PipelineAbortedError';
    }
}

/**
 * Throw `PipelineAbortedError` if the signal has fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
        throw new PipelineAbortedError();
    }
}

/**
 * Render an unknown thrown value for logs and checkpoint records.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
