/** Base class for collaborator failures the caller may retry. */
export class RetryableError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class RateLimitedError extends RetryableError {
    constructor(
        message: string,
        readonly retryAfterMs: number | null = null,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

export class TimeoutError extends RetryableError {}

/** The request never got an HTTP answer (connection reset, DNS, TLS). */
export class TransportError extends RetryableError {}

/** The source answered, but not with something we can read. */
export class MalformedResponseError extends RetryableError {}

/** The LLM answered, but without usable content. */
export class InvalidResponseError extends RetryableError {}

export class SourceUnavailableError extends Error {
    constructor(
        message: string,
        readonly attempts: number,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'SourceUnavailableError';
    }
}

export type AnalysisFailureReason = 'llm' | 'parse' | 'source';

export class AnalysisError extends Error {
    constructor(
        readonly listingId: string,
        readonly reason: AnalysisFailureReason,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'AnalysisError';
    }
}

export class ConfigInvalidError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigInvalidError';
    }
}

export class CacheCorruptionError extends Error {
    constructor(
        readonly key: string,
        message: string,
    ) {
        super(message);
        this.name = 'CacheCorruptionError';
    }
}

/** Raised by response parsers; the pipeline retries once with a stricter instruction. */
export class ResponseParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ResponseParseError';
    }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
