import { FeatureFrame, ValidationResult, Validator } from '../types';
import { StrategySpec } from './spec';
import { entrySignal, exitSignal } from './rules';

const TRADING_DAYS_PER_YEAR = 252;

const unique = (messages: string[]): string[] => Array.from(new Set(messages));

function result(errors: string[], warnings: string[]): ValidationResult {
    const dedupedErrors = unique(errors);
    return { ok: dedupedErrors.length === 0, errors: dedupedErrors, warnings: unique(warnings) };
}

export function validateStructure(spec: StrategySpec): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    // ISO dates compare lexically
    if (spec.startDate >= spec.endDate) errors.push('Start date must be before end date.');
    if (spec.entryRules.length === 0) errors.push('At least one entry rule is required.');
    if (spec.exitRules.length === 0) errors.push('At least one exit rule is required.');
    if (spec.metrics.length === 0) warnings.push('No metrics specified; default metrics will be used.');

    for (const rule of [...spec.entryRules, ...spec.exitRules]) {
        if (rule.type === 'crossover') {
            if (rule.fastMa <= 0 || rule.slowMa <= 0) errors.push('Moving average windows must be positive integers.');
            if (rule.fastMa === rule.slowMa) errors.push('Fast and slow moving averages must differ.');
            if (rule.fastMa < 5 || rule.slowMa < 5) {
                warnings.push('Very small moving average windows (under 5 days) may be unstable or overly reactive.');
            }
            if (rule.fastMa > 200 || rule.slowMa > 200) {
                warnings.push('Very large moving average windows (over 200 days) may make the strategy slow and unresponsive.');
            }
        } else {
            if (rule.window <= 1) errors.push('Volatility window must be greater than 1.');
            if (rule.window > TRADING_DAYS_PER_YEAR * 5) {
                warnings.push('Very large volatility windows may dilute signal responsiveness.');
            }
        }
    }

    const crossoverDirections = new Map<string, Set<string>>();
    const volRelations = new Map<string, Set<string>>();
    const note = (map: Map<string, Set<string>>, key: string, side: string): void => {
        const sides = map.get(key) ?? new Set<string>();
        sides.add(side);
        map.set(key, sides);
    };
    for (const rule of spec.entryRules) {
        if (rule.type === 'crossover') note(crossoverDirections, `${rule.fastMa}/${rule.slowMa}`, rule.direction);
        else note(volRelations, `${rule.window}/${rule.threshold}`, rule.relation);
    }
    for (const sides of crossoverDirections.values()) {
        if (sides.size > 1) {
            errors.push('Entry rules require the same moving averages to be both above and below each other, which is impossible.');
        }
    }
    for (const sides of volRelations.values()) {
        if (sides.size > 1) {
            errors.push('Entry rules require volatility to be both above and below the same threshold, which is impossible.');
        }
    }

    return result(errors, warnings);
}

/** Checks that need the feature frame: history length and whether the rules can fire at all. */
export function validateWithData(spec: StrategySpec, frame: FeatureFrame): ValidationResult {
    const warnings: string[] = [];
    if (frame.length === 0) {
        return result(['No price data is available for the requested period.'], warnings);
    }

    let maxMa = 0;
    let maxVol = 0;
    let maxLookahead = 0;
    let maxDuration = 0;
    for (const rule of [...spec.entryRules, ...spec.exitRules]) {
        if (rule.type === 'crossover') maxMa = Math.max(maxMa, rule.fastMa, rule.slowMa);
        else maxVol = Math.max(maxVol, rule.window);
        maxLookahead = Math.max(maxLookahead, rule.lookaheadDays ?? 0);
        maxDuration = Math.max(maxDuration, rule.durationDays ?? 0);
    }

    const requiredLen = Math.max(
        maxMa > 0 ? maxMa + 10 : 0,
        maxVol > 0 ? maxVol + TRADING_DAYS_PER_YEAR : 0,
        maxLookahead > 0 ? maxLookahead + 10 : 0,
        maxDuration > 0 ? maxDuration + 10 : 0,
    );
    if (requiredLen > 0 && frame.length < requiredLen) {
        warnings.push(
            `Strategy uses long lookback windows (up to ${requiredLen} days) but only ${frame.length} data points are available. ` +
            'Early signal values may be unreliable.',
        );
    }

    let anyEntry = false;
    let anyExit = false;
    for (let i = 0; i < frame.length && !(anyEntry && anyExit); i++) {
        anyEntry = anyEntry || entrySignal(spec, frame, i);
        anyExit = anyExit || exitSignal(spec, frame, i);
    }

    if (!anyEntry) {
        warnings.push('Given the historical data and rules, this strategy is unlikely to generate any entries. It may produce zero trades.');
    } else if (!anyExit) {
        warnings.push('Entry conditions can occur, but exit conditions never trigger on this data. Positions may never close once opened.');
    }

    return result([], warnings);
}

export const defaultValidator: Validator = { validateStructure, validateWithData };
