import { BUDGET, MAX_OUTPUT_TOKENS } from './config';
import type { IntelligenceLevel } from './types';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

// How aggressively discovery fills gaps the mapping document leaves open
export type GapFilling = 'strict' | 'evidence' | 'conventional';

export type CommentDensity = 'minimal' | 'standard' | 'verbose';

export interface StrategyProfile {
    level: IntelligenceLevel;
    /** Build attempts per node, first attempt included. */
    maxUnitAttempts: number;
    /** Discovery prompts before falling back to hints. */
    discoveryAttempts: number;
    gapFilling: GapFilling;
    commentDensity: CommentDensity;
    /** Fraction of the ceiling held back from non-essential calls. */
    reserveFraction: number;
    /** Treat a probe returning zero rows as a recoverable failure. */
    rejectEmptyResults: boolean;
    /** Probe row estimates above this are a recoverable failure. */
    maxRowEstimate: number | null;
    /** Keep fragments whose check was inconclusive instead of replacing them. */
    acceptUnverified: boolean;
    /** Spend one non-essential call repairing a failing final query. */
    repairFinalQuery: boolean;
    discoveryMaxTokens: number;
    unitMaxTokens: number;
}

export type StrategyOverrides = Partial<Omit<StrategyProfile, 'level'>>;

/* -------------------------------------------------------------------------- */
/* Profiles                                                                   */
/* -------------------------------------------------------------------------- */

export function parseIntelligenceLevel(raw: unknown): IntelligenceLevel | null {
    const v = String(raw ?? '').trim().toLowerCase();
    if (v === 'conservative' || v === 'balanced' || v === 'aggressive') return v;
    return null;
}

export function strategyForLevel(level: IntelligenceLevel): StrategyProfile {
    switch (level) {
        case 'conservative':
            return {
                level,
                maxUnitAttempts: 2,
                discoveryAttempts: 1,
                gapFilling: 'strict',
                commentDensity: 'verbose',
                reserveFraction: Math.max(BUDGET.RESERVE_FRACTION, 0.2),
                rejectEmptyResults: false,
                maxRowEstimate: null,
                acceptUnverified: false,
                repairFinalQuery: false,
                discoveryMaxTokens: MAX_OUTPUT_TOKENS.DISCOVERY,
                unitMaxTokens: MAX_OUTPUT_TOKENS.BUILD_UNIT,
            };
        case 'balanced':
            return {
                level,
                maxUnitAttempts: 3,
                discoveryAttempts: 2,
                gapFilling: 'evidence',
                commentDensity: 'standard',
                reserveFraction: BUDGET.RESERVE_FRACTION,
                rejectEmptyResults: false,
                maxRowEstimate: null,
                acceptUnverified: true,
                repairFinalQuery: true,
                discoveryMaxTokens: MAX_OUTPUT_TOKENS.DISCOVERY,
                unitMaxTokens: MAX_OUTPUT_TOKENS.BUILD_UNIT,
            };
        case 'aggressive':
            return {
                level,
                maxUnitAttempts: 4,
                discoveryAttempts: 2,
                gapFilling: 'conventional',
                commentDensity: 'minimal',
                reserveFraction: Math.min(BUDGET.RESERVE_FRACTION, 0.05),
                rejectEmptyResults: false,
                maxRowEstimate: null,
                acceptUnverified: true,
                repairFinalQuery: true,
                discoveryMaxTokens: MAX_OUTPUT_TOKENS.DISCOVERY,
                unitMaxTokens: MAX_OUTPUT_TOKENS.BUILD_UNIT,
            };
    }
}

export function buildStrategy(level: IntelligenceLevel, overrides?: StrategyOverrides): StrategyProfile {
    const base = strategyForLevel(level);
    return { ...base, ...(overrides || {}), level };
}

/* -------------------------------------------------------------------------- */
/* Override parsing (config files, request payloads)                          */
/* -------------------------------------------------------------------------- */

const POSITIVE_INT_KEYS = ['maxUnitAttempts', 'discoveryAttempts', 'discoveryMaxTokens', 'unitMaxTokens'] as const;
const BOOLEAN_KEYS = ['rejectEmptyResults', 'acceptUnverified', 'repairFinalQuery'] as const;

function isOneOf<T extends string>(list: readonly T[], key: string): key is T {
    return list.some((k) => k === key);
}

/**
 * Validates an untyped overrides object. Unknown keys are reported, not ignored.
 */
export function parseStrategyOverrides(raw: unknown): { overrides: StrategyOverrides; problems: string[] } {
    const problems: string[] = [];
    const overrides: StrategyOverrides = {};
    if (raw === undefined || raw === null) return { overrides, problems };
    if (typeof raw !== 'object' || Array.isArray(raw)) {
        return { overrides, problems: ['strategy overrides must be an object'] };
    }

    const entries: Array<[string, unknown]> = Object.entries(raw);
    for (const [key, value] of entries) {
        if (isOneOf(POSITIVE_INT_KEYS, key)) {
            if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
                problems.push(`${key} must be a positive integer`);
                continue;
            }
            overrides[key] = value;
        } else if (isOneOf(BOOLEAN_KEYS, key)) {
            if (typeof value !== 'boolean') {
                problems.push(`${key} must be a boolean`);
                continue;
            }
            overrides[key] = value;
        } else if (key === 'reserveFraction') {
            if (typeof value !== 'number' || value < 0 || value >= 1) {
                problems.push('reserveFraction must be in [0, 1)');
                continue;
            }
            overrides.reserveFraction = value;
        } else if (key === 'maxRowEstimate') {
            if (value === null || (typeof value === 'number' && value >= 0)) {
                overrides.maxRowEstimate = value;
            } else {
                problems.push('maxRowEstimate must be null or a non-negative number');
            }
        } else if (key === 'gapFilling') {
            if (value !== 'strict' && value !== 'evidence' && value !== 'conventional') {
                problems.push('gapFilling must be strict|evidence|conventional');
                continue;
            }
            overrides.gapFilling = value;
        } else if (key === 'commentDensity') {
            if (value !== 'minimal' && value !== 'standard' && value !== 'verbose') {
                problems.push('commentDensity must be minimal|standard|verbose');
                continue;
            }
            overrides.commentDensity = value;
        } else {
            problems.push(`unknown strategy key: ${key}`);
        }
    }

    return { overrides, problems };
}
