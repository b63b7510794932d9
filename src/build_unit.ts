/**
 * BuildUnit lifecycle and recovery decisions
 *
 * Lifecycle: untested → failed(n) → retrying → { passed, placeholder, unverified }
 *
 * Units are replaced, never mutated: every transition returns a new object and a
 * passed unit is frozen. decideRecovery() is a pure function of the unit, the
 * verdict and the strategy.
 */

import type { ErrorCode } from './structured_error';
import type { StrategyProfile } from './strategy';
import type { BuildUnit, GraphNode, UnitLifecycle, UnitSource } from './types';
import type { Verdict } from './validator';

/* -------------------------------------------------------------------------- */
/* Transitions                                                                */
/* -------------------------------------------------------------------------- */

const ALLOWED: Record<UnitLifecycle, readonly UnitLifecycle[]> = {
    untested: ['passed', 'failed', 'placeholder', 'unverified'],
    failed: ['retrying', 'placeholder'],
    retrying: ['passed', 'failed', 'placeholder', 'unverified'],
    passed: [],
    placeholder: [],
    unverified: [],
};

export class UnitTransitionError extends Error {
    constructor(nodeId: string, from: UnitLifecycle, to: UnitLifecycle) {
        super(`Illegal build unit transition for ${nodeId}: ${from} -> ${to}`);
        this.name = 'UnitTransitionError';
    }
}

function transition(unit: BuildUnit, to: UnitLifecycle, patch: Partial<BuildUnit>, reason?: string): BuildUnit {
    if (!ALLOWED[unit.lifecycle].includes(to)) {
        throw new UnitTransitionError(unit.nodeId, unit.lifecycle, to);
    }
    return {
        ...unit,
        ...patch,
        lifecycle: to,
        history: [...unit.history, { from: unit.lifecycle, to, attempt: patch.attempts ?? unit.attempts, reason }],
    };
}

export function newUnit(node: GraphNode): BuildUnit {
    return {
        nodeId: node.id,
        kind: node.kind,
        fragment: null,
        status: 'untested',
        lifecycle: 'untested',
        attempts: 0,
        source: 'provider',
        history: [],
    };
}

/** Attaches a freshly built fragment. A failed unit moves to `retrying`. */
export function withDraft(unit: BuildUnit, fragment: string, source: UnitSource): BuildUnit {
    const patch: Partial<BuildUnit> = { fragment, source, status: 'untested', attempts: unit.attempts + 1 };
    if (unit.lifecycle === 'failed') return transition(unit, 'retrying', patch, unit.failureReason);
    if (unit.lifecycle === 'untested' || unit.lifecycle === 'retrying') return { ...unit, ...patch };
    throw new UnitTransitionError(unit.nodeId, unit.lifecycle, 'retrying');
}

export function markPassed(unit: BuildUnit, rowEstimate?: number): BuildUnit {
    const next = transition(unit, 'passed', { status: 'passed', rowEstimate, failureReason: undefined });
    return Object.freeze(next);
}

export function markFailed(unit: BuildUnit, reason: string): BuildUnit {
    return transition(unit, 'failed', { status: 'failed', failureReason: reason, draft: unit.fragment ?? unit.draft }, reason);
}

/** Replaces the unit with a pure placeholder; the last draft is kept for the comment. */
export function toPlaceholder(unit: BuildUnit, reason: string, suggestion: string): BuildUnit {
    return Object.freeze(transition(unit, 'placeholder', {
        status: 'skipped-with-comment',
        fragment: null,
        draft: unit.fragment ?? unit.draft,
        source: 'placeholder',
        failureReason: reason,
        suggestion,
        comment: `unresolved: ${reason}`,
    }, reason));
}

/** Keeps the fragment without a passing check. */
export function toUnverified(unit: BuildUnit, reason: string, suggestion: string): BuildUnit {
    return Object.freeze(transition(unit, 'unverified', {
        status: 'skipped-with-comment',
        failureReason: reason,
        suggestion,
        comment: `unverified: ${reason}`,
    }, reason));
}

/** Usable by dependents: passed, or skipped with a comment. */
export function isSettled(unit: BuildUnit | undefined): boolean {
    return unit !== undefined && (unit.status === 'passed' || unit.status === 'skipped-with-comment');
}

/* -------------------------------------------------------------------------- */
/* Recovery decisions                                                         */
/* -------------------------------------------------------------------------- */

export type RecoveryDecision =
    | { action: 'accept'; rowEstimate?: number }
    | { action: 'retry'; attempt: number; reason: string }
    | { action: 'placeholder'; code: ErrorCode; reason: string }
    | { action: 'accept-unverified'; reason: string };

/**
 * What to do with a unit after validation. `unit.attempts` counts build attempts
 * made so far, the current one included.
 */
export function decideRecovery(
    unit: Readonly<BuildUnit>,
    verdict: Verdict,
    strategy: Pick<StrategyProfile, 'maxUnitAttempts' | 'acceptUnverified'>
): RecoveryDecision {
    switch (verdict.outcome) {
        case 'passed':
            return { action: 'accept', rowEstimate: verdict.rowEstimate };
        case 'inconclusive':
            return strategy.acceptUnverified
                ? { action: 'accept-unverified', reason: verdict.reason }
                : { action: 'placeholder', code: 'UNVERIFIED_FRAGMENT', reason: verdict.reason };
        case 'failed':
            if (verdict.classification === 'structural') {
                return { action: 'placeholder', code: 'STRUCTURAL_GAP', reason: verdict.reason };
            }
            if (unit.attempts >= strategy.maxUnitAttempts) {
                return { action: 'placeholder', code: 'RETRIES_EXHAUSTED', reason: verdict.reason };
            }
            return { action: 'retry', attempt: unit.attempts, reason: verdict.reason };
    }
}

/** Actionable suggestion for an unresolved node. */
export function suggestionFor(node: GraphNode, code: ErrorCode): string {
    switch (node.kind) {
        case 'table':
            return `Confirm the name and columns of table ${node.table.name} in the mapping document`;
        case 'join':
            return `Specify the join condition between ${node.relationship.left} and ${node.relationship.right}`;
        case 'computed':
            return code === 'STRUCTURAL_GAP'
                ? `Check that the columns used by ${node.column.alias ?? node.column.column} exist on ${node.column.table}`
                : `Clarify how ${node.column.alias ?? node.column.column} is calculated`;
        case 'filter':
            return `Clarify the filter on ${node.filter.table}.${node.filter.column} (${node.filter.operator} ${node.filter.value})`;
    }
}
