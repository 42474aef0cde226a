import { FeatureFrame } from '../types';
import { CrossoverRule, Rule, StrategySpec, VolFilterRule, maKey, rvKey, rvMedianKey } from './spec';

/** Condition of a single rule on a single row, ignoring lookahead and duration. Missing values never match. */
export function conditionAt(rule: Rule, frame: FeatureFrame, idx: number): boolean {
    const row = frame[idx];
    if (row === undefined) return false;

    if (rule.type === 'crossover') {
        const fast = row.values[maKey(rule.fastMa)];
        const slow = row.values[maKey(rule.slowMa)];
        if (fast == null || slow == null) return false;
        return rule.direction === 'above' ? fast > slow : fast < slow;
    }

    const rv = row.values[rvKey(rule.window)];
    const median = row.values[rvMedianKey(rule.window)];
    if (rv == null || median == null) return false;
    return rule.relation === 'below' ? rv < median : rv > median;
}

/**
 * Full rule evaluation at `idx`. A duration requirement wins over lookahead:
 * the condition must hold on the N days ending at idx. With lookahead it may
 * hold on any day in idx..idx+N.
 */
export function evaluateRule(rule: Rule, frame: FeatureFrame, idx: number): boolean {
    if (rule.durationDays !== undefined) {
        if (idx < rule.durationDays - 1) return false;
        for (let offset = 0; offset < rule.durationDays; offset++) {
            if (!conditionAt(rule, frame, idx - offset)) return false;
        }
        return true;
    }

    if (rule.lookaheadDays !== undefined) {
        return firstMatchWithin(rule, frame, idx, rule.lookaheadDays) !== null;
    }

    return conditionAt(rule, frame, idx);
}

/** Index of the first day in idx..idx+window where the bare condition holds. */
export function firstMatchWithin(rule: Rule, frame: FeatureFrame, idx: number, window: number): number | null {
    for (let offset = 0; offset <= window; offset++) {
        const at = idx + offset;
        if (at >= frame.length) break;
        if (conditionAt(rule, frame, at)) return at;
    }
    return null;
}

function sequentialEntry(rules: Rule[], frame: FeatureFrame, idx: number): boolean {
    const [first, ...rest] = rules;
    if (first === undefined || !conditionAt(first, frame, idx)) return false;

    return rest.every(rule =>
        rule.lookaheadDays === undefined
            ? conditionAt(rule, frame, idx)
            : firstMatchWithin(rule, frame, idx, rule.lookaheadDays) !== null,
    );
}

export function entrySignal(spec: StrategySpec, frame: FeatureFrame, idx: number): boolean {
    if (spec.entrySequential) return sequentialEntry(spec.entryRules, frame, idx);
    return spec.entryRules.length > 0 && spec.entryRules.every(rule => evaluateRule(rule, frame, idx));
}

/** The first exit rule that fires at idx, if any. */
export function firingExitRule(spec: StrategySpec, frame: FeatureFrame, idx: number): Rule | undefined {
    return spec.exitRules.find(rule => evaluateRule(rule, frame, idx));
}

export function exitSignal(spec: StrategySpec, frame: FeatureFrame, idx: number): boolean {
    return firingExitRule(spec, frame, idx) !== undefined;
}

const fmt2 = (value: number | null | undefined): string => (value ?? Number.NaN).toFixed(2);
const pct2 = (value: number | null | undefined): string => `${((value ?? Number.NaN) * 100).toFixed(2)}%`;

function describeCrossover(rule: CrossoverRule, values: Record<string, number | null>, action: string): string {
    return (
        `${action}: ${rule.fastMa}-day MA (${fmt2(values[maKey(rule.fastMa)])}) ` +
        `crossed ${rule.direction} ${rule.slowMa}-day MA (${fmt2(values[maKey(rule.slowMa)])})`
    );
}

function describeVolFilter(rule: VolFilterRule, values: Record<string, number | null>, action: string): string {
    return (
        `${action}: ${rule.window}-day RV (${pct2(values[rvKey(rule.window)])}) ` +
        `${rule.relation} 1Y median (${pct2(values[rvMedianKey(rule.window)])})`
    );
}

/** Human-readable reason for a rule firing on the given row. */
export function describeRule(rule: Rule, frame: FeatureFrame, idx: number, action: 'Entry' | 'Exit'): string {
    const values = frame[idx]?.values ?? {};
    return rule.type === 'crossover'
        ? describeCrossover(rule, values, action)
        : describeVolFilter(rule, values, action);
}

/** Reasons for an entry at idx; sequential rules are described on the day they matched. */
export function entryReasons(spec: StrategySpec, frame: FeatureFrame, idx: number): string[] {
    if (!spec.entrySequential) {
        return spec.entryRules
            .filter(rule => evaluateRule(rule, frame, idx))
            .map(rule => describeRule(rule, frame, idx, 'Entry'));
    }

    const [first, ...rest] = spec.entryRules;
    if (first === undefined) return [];
    const reasons = [describeRule(first, frame, idx, 'Entry')];
    for (const rule of rest) {
        const at = firstMatchWithin(rule, frame, idx, rule.lookaheadDays ?? 0);
        reasons.push(describeRule(rule, frame, at ?? idx, 'Entry'));
    }
    return reasons;
}
