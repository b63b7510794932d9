/**
 * Validator - trial execution of candidate fragments
 *
 * validate() is side-effect free on the unit: it reads the fragment and returns
 * a verdict. State changes belong to the recovery loop (build_unit.ts).
 */

import { CallTimeoutError, withTimeout } from './async_utils';
import { TIMEOUTS } from './config';
import { isPipelineError } from './structured_error';
import type { StrategyProfile } from './strategy';
import type { BuildUnit, CheckContext, CheckResult, QueryChecker } from './types';

export type FailureClass = 'structural' | 'recoverable';

export type Verdict =
    | { outcome: 'passed'; rowEstimate?: number }
    | { outcome: 'failed'; reason: string; classification: FailureClass }
    | { outcome: 'inconclusive'; reason: string };

// Missing referenced entities: no retry can fix these without new information.
const STRUCTURAL_PATTERNS: RegExp[] = [
    /no such (table|column)/i,
    /unknown (table|column|identifier)/i,
    /does not exist/i,
    /ambiguous column name/i,
    /missing (referenced )?(table|column|entity)/i,
    /invalid (column|object) name/i,
];

export function classifyFailure(reason: string): FailureClass {
    return STRUCTURAL_PATTERNS.some((re) => re.test(reason)) ? 'structural' : 'recoverable';
}

export type CardinalityExpectations = Pick<StrategyProfile, 'rejectEmptyResults' | 'maxRowEstimate'>;

export class Validator {
    constructor(
        private readonly checker: QueryChecker,
        private readonly expectations: CardinalityExpectations,
        private readonly timeoutMs: number = TIMEOUTS.VALIDATION_CHECK_MS
    ) { }

    async validate(unit: Readonly<BuildUnit>, context: CheckContext, signal?: AbortSignal): Promise<Verdict> {
        if (unit.fragment === null) {
            return { outcome: 'failed', reason: 'unit has no fragment', classification: 'structural' };
        }
        return this.checkFragment(unit.fragment, context, signal);
    }

    async checkFragment(fragment: string, context: CheckContext, signal?: AbortSignal): Promise<Verdict> {
        let result: CheckResult;
        try {
            result = await withTimeout((s) => this.checker.check(fragment, context, s), this.timeoutMs, signal);
        } catch (e) {
            // Cancellation is the pipeline's business, not a verdict.
            if (isPipelineError(e)) throw e;
            if (e instanceof CallTimeoutError) {
                return { outcome: 'inconclusive', reason: `check timed out after ${e.timeoutMs}ms` };
            }
            return { outcome: 'inconclusive', reason: `checker error: ${e instanceof Error ? e.message : String(e)}` };
        }

        if (!result.passed) {
            const reason = result.failureReason || 'check failed without a reason';
            return { outcome: 'failed', reason, classification: classifyFailure(reason) };
        }

        const rows = result.rowEstimate;
        if (rows !== undefined) {
            if (this.expectations.rejectEmptyResults && rows === 0) {
                return { outcome: 'failed', reason: 'probe returned no rows', classification: 'recoverable' };
            }
            if (this.expectations.maxRowEstimate !== null && rows > this.expectations.maxRowEstimate) {
                return {
                    outcome: 'failed',
                    reason: `probe returned ${rows} rows, above the expected maximum of ${this.expectations.maxRowEstimate}`,
                    classification: 'recoverable',
                };
            }
        }
        return { outcome: 'passed', rowEstimate: rows };
    }
}
