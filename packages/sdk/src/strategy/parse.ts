import Ajv from 'ajv';
import { InvalidInputError } from '../errors';
import { DEFAULT_METRICS, Direction, Rule, StrategySpec } from './spec';

interface RawRule {
    type: 'crossover' | 'vol_filter';
    fast_ma?: number;
    slow_ma?: number;
    direction?: Direction;
    window?: number;
    threshold?: 'median_1y';
    relation?: Direction;
    lookahead_days?: number;
    duration_days?: number;
}

interface RawStrategySpec {
    ticker: string;
    start_date: string;
    end_date: string;
    entry_rules: RawRule[];
    exit_rules: RawRule[];
    metrics?: string[];
    entry_sequential?: boolean;
}

const ruleSchema = {
    type: 'object',
    required: ['type'],
    properties: {
        type: { enum: ['crossover', 'vol_filter'] },
        fast_ma: { type: 'integer' },
        slow_ma: { type: 'integer' },
        direction: { enum: ['above', 'below'] },
        window: { type: 'integer' },
        threshold: { enum: ['median_1y'] },
        relation: { enum: ['above', 'below'] },
        lookahead_days: { type: 'integer', minimum: 0 },
        duration_days: { type: 'integer', minimum: 1 },
    },
    allOf: [
        {
            if: { properties: { type: { const: 'crossover' } } },
            then: { required: ['fast_ma', 'slow_ma', 'direction'] },
        },
        {
            if: { properties: { type: { const: 'vol_filter' } } },
            then: { required: ['window'] },
        },
    ],
};

const specSchema = {
    type: 'object',
    required: ['ticker', 'start_date', 'end_date', 'entry_rules', 'exit_rules'],
    properties: {
        ticker: { type: 'string', minLength: 1 },
        start_date: { type: 'string' },
        end_date: { type: 'string' },
        entry_rules: { type: 'array', items: ruleSchema },
        exit_rules: { type: 'array', items: ruleSchema },
        metrics: { type: 'array', items: { type: 'string' } },
        entry_sequential: { type: 'boolean' },
    },
};

// coerceTypes: model output sometimes quotes numbers ("fast_ma": "10")
const ajv = new Ajv({ allErrors: true, coerceTypes: true });
const validateRawSpec = ajv.compile<RawStrategySpec>(specSchema);

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const MISSING_DATES_HINT =
    'Your prompt is missing dates. Please include explicit dates in your strategy description, ' +
    "for example: 'Backtest AAPL from 2020-01-01 to 2024-01-01'";

function isPlaceholderDate(value: unknown): boolean {
    return typeof value !== 'string' || value.length === 0 || value.toUpperCase().includes('YYYY');
}

function checkIsoDate(field: string, value: string): string {
    const parsed = new Date(`${value}T00:00:00Z`);
    if (!ISO_DATE.test(value) || Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value) {
        throw new InvalidInputError(`Invalid date format in spec: ${field} "${value}" is not YYYY-MM-DD`);
    }
    return value;
}

function toRule(raw: RawRule): Rule {
    const timing = {
        ...(raw.lookahead_days !== undefined ? { lookaheadDays: raw.lookahead_days } : {}),
        ...(raw.duration_days !== undefined ? { durationDays: raw.duration_days } : {}),
    };

    if (raw.type === 'crossover') {
        if (raw.fast_ma === undefined || raw.slow_ma === undefined || raw.direction === undefined) {
            throw new InvalidInputError('Crossover rule requires fast_ma, slow_ma and direction');
        }
        return { type: 'crossover', fastMa: raw.fast_ma, slowMa: raw.slow_ma, direction: raw.direction, ...timing };
    }

    if (raw.window === undefined) {
        throw new InvalidInputError('Volatility filter rule requires window');
    }
    return {
        type: 'vol_filter',
        window: raw.window,
        threshold: raw.threshold ?? 'median_1y',
        relation: raw.relation ?? 'below',
        ...timing,
    };
}

/**
 * Parse a snake_case strategy object (as produced by a model) into a StrategySpec.
 * Throws InvalidInputError on anything the caller has to fix.
 */
export function parseStrategySpec(data: unknown): StrategySpec {
    if (typeof data === 'object' && data !== null) {
        const startDate: unknown = Reflect.get(data, 'start_date');
        const endDate: unknown = Reflect.get(data, 'end_date');
        if (isPlaceholderDate(startDate)) {
            throw new InvalidInputError(`Generated spec has an invalid start_date. ${MISSING_DATES_HINT}`);
        }
        if (isPlaceholderDate(endDate)) {
            throw new InvalidInputError(`Generated spec has an invalid end_date. ${MISSING_DATES_HINT}`);
        }
    }

    if (!validateRawSpec(data)) {
        throw new InvalidInputError(`Strategy spec does not match schema: ${ajv.errorsText(validateRawSpec.errors)}`);
    }

    const entryRules = data.entry_rules.map(toRule);
    const exitRules = data.exit_rules.map(toRule);
    if (entryRules.length === 0) throw new InvalidInputError('At least one entry rule is required.');
    if (exitRules.length === 0) throw new InvalidInputError('At least one exit rule is required.');

    return {
        ticker: data.ticker.trim().toUpperCase(),
        startDate: checkIsoDate('start_date', data.start_date),
        endDate: checkIsoDate('end_date', data.end_date),
        entryRules,
        exitRules,
        metrics: data.metrics ?? [...DEFAULT_METRICS],
        entrySequential: data.entry_sequential ?? false,
    };
}
