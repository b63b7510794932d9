/**
 * Structured Error Schema
 *
 * Machine-readable errors for the generation pipeline. Every code carries a
 * severity; degraded and fatal errors always carry a suggestion the caller can act on.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Recoverable: retried by the gateway or the validator loop
    | 'RATE_LIMITED'
    | 'NETWORK_ERROR'
    | 'PROVIDER_ERROR'
    | 'VALIDATION_FAILED'

    // Degraded: pipeline continues with a weaker result
    | 'DISCOVERY_PARTIAL'
    | 'BUDGET_EXHAUSTED'
    | 'RETRIES_EXHAUSTED'
    | 'STRUCTURAL_GAP'
    | 'UNVERIFIED_FRAGMENT'
    | 'OPTIONAL_STAGE_FAILED'

    // Fatal: request aborted
    | 'DEPENDENCY_CYCLE'
    | 'ALL_PROVIDERS_UNAVAILABLE'
    | 'REQUIRED_STAGE_FAILED'
    | 'CANCELLED'
    | 'TIMEOUT'
    | 'INVALID_REQUEST';

export type Severity = 'RECOVERABLE' | 'DEGRADED' | 'FATAL';

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    suggestion: string;
    context: Record<string, unknown>;
    timestamp: string;
}

const SEVERITY: Record<ErrorCode, Severity> = {
    RATE_LIMITED: 'RECOVERABLE',
    NETWORK_ERROR: 'RECOVERABLE',
    PROVIDER_ERROR: 'RECOVERABLE',
    VALIDATION_FAILED: 'RECOVERABLE',
    DISCOVERY_PARTIAL: 'DEGRADED',
    BUDGET_EXHAUSTED: 'DEGRADED',
    RETRIES_EXHAUSTED: 'DEGRADED',
    STRUCTURAL_GAP: 'DEGRADED',
    UNVERIFIED_FRAGMENT: 'DEGRADED',
    OPTIONAL_STAGE_FAILED: 'DEGRADED',
    DEPENDENCY_CYCLE: 'FATAL',
    ALL_PROVIDERS_UNAVAILABLE: 'FATAL',
    REQUIRED_STAGE_FAILED: 'FATAL',
    CANCELLED: 'FATAL',
    TIMEOUT: 'FATAL',
    INVALID_REQUEST: 'FATAL',
};

export function severityOf(code: ErrorCode): Severity {
    return SEVERITY[code];
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    suggestion: string,
    context: Record<string, unknown> = {}
): StructuredError {
    return {
        code,
        message,
        severity: severityOf(code),
        suggestion,
        context,
        timestamp: new Date().toISOString(),
    };
}

/**
 * Thrown to terminate a pipeline. Only fatal codes travel this way; degraded
 * conditions are reported as events and diagnostics instead.
 */
export class PipelineError extends Error {
    constructor(public readonly structured: StructuredError) {
        super(structured.message);
        this.name = 'PipelineError';
    }

    get code(): ErrorCode {
        return this.structured.code;
    }
}

export function isPipelineError(e: unknown): e is PipelineError {
    return e instanceof PipelineError;
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static dependencyCycle(members: string[]): PipelineError {
        return new PipelineError(createStructuredError(
            'DEPENDENCY_CYCLE',
            `Dependency cycle detected: ${members.join(' -> ')}`,
            `Break the circular reference between ${members.slice(0, -1).join(', ')} in the mapping document (one of them must not depend on the other)`,
            { members }
        ));
    }

    static allProvidersUnavailable(details: Record<string, unknown>): PipelineError {
        return new PipelineError(createStructuredError(
            'ALL_PROVIDERS_UNAVAILABLE',
            'All configured providers are cooling down or rate limited',
            'Wait for provider cooldown to elapse, raise provider rate limits, or configure an additional provider',
            details
        ));
    }

    static requiredStageFailed(stage: string, reason: string, suggestion: string): PipelineError {
        return new PipelineError(createStructuredError(
            'REQUIRED_STAGE_FAILED',
            `Required stage ${stage} failed: ${reason}`,
            suggestion,
            { stage }
        ));
    }

    static cancelled(reason = 'cancelled'): PipelineError {
        return new PipelineError(createStructuredError(
            'CANCELLED',
            reason,
            'Resubmit the request when ready; no partial artifact was produced',
            {}
        ));
    }

    static timeout(timeoutMs: number): PipelineError {
        return new PipelineError(createStructuredError(
            'TIMEOUT',
            `Request exceeded its ${timeoutMs}ms wall-clock limit`,
            'Increase the request timeout or lower the intelligence level to reduce retries',
            { timeout_ms: timeoutMs }
        ));
    }

    static invalidRequest(problems: string[]): PipelineError {
        return new PipelineError(createStructuredError(
            'INVALID_REQUEST',
            `Invalid generation request: ${problems.join('; ')}`,
            'Fix the listed request fields and resubmit',
            { problems }
        ));
    }
}
