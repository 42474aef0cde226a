import { InvalidInputError, toError } from '../errors';
import { Explainer, Interpreter, LlmCallOptions, Translator } from '../types';
import { StrategySpec } from '../strategy/spec';
import { parseStrategySpec } from '../strategy/parse';
import {
    EXPLAINER_SYSTEM,
    INTERPRETER_SYSTEM,
    TRANSLATOR_SYSTEM,
    explainerUserPrompt,
    interpreterUserPrompt,
    translatorUserPrompt,
} from './prompts';
import { LlmTask, TokenUsage, UsageSink, usageRecord } from './usage';

export interface CompletionRequest {
    model: string;
    system: string;
    user: string;
    /** Ask the model for a single JSON object. */
    json: boolean;
    signal?: AbortSignal;
}

export interface Completion {
    text: string;
    /** Token counts as reported by the provider, when it reports them. */
    usage?: TokenUsage;
}

/**
 * Any chat-completion client. Implementations throw TransientIOError for
 * retryable failures and AuthenticationError for bad credentials.
 */
export type CompletionFn = (request: CompletionRequest) => Promise<Completion>;

export interface LlmClientOptions {
    /** Receives every call made through this client. Per-call `onUsage` sinks get the same record. */
    onUsage?: UsageSink;
    clock?: () => Date;
}

async function completeTracked<T>(
    complete: CompletionFn,
    request: CompletionRequest,
    task: LlmTask,
    sinks: Array<UsageSink | undefined>,
    clock: () => Date,
    read: (text: string) => T,
): Promise<T> {
    const started = clock();
    let usage: TokenUsage | undefined;
    let failure: Error | undefined;

    try {
        const completion = await complete(request);
        usage = completion.usage;
        return read(completion.text);
    } catch (err) {
        failure = toError(err);
        throw err;
    } finally {
        const finished = clock();
        const record = usageRecord(task, request.model, usage, finished.getTime() - started.getTime(), failure, finished);
        for (const sink of sinks) sink?.(record);
    }
}

function parseSpecReply(raw: string): StrategySpec {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (err) {
        throw new InvalidInputError('Model output is not valid JSON', { cause: err });
    }
    return parseStrategySpec(data);
}

const asText = (text: string): string => text;

function tracker(complete: CompletionFn, client: LlmClientOptions) {
    const clock = client.clock ?? (() => new Date());
    return <T>(task: LlmTask, request: CompletionRequest, options: LlmCallOptions, read: (text: string) => T): Promise<T> =>
        completeTracked(complete, { ...request, signal: options.signal }, task, [client.onUsage, options.onUsage], clock, read);
}

export function createTranslator(complete: CompletionFn, client: LlmClientOptions = {}): Translator {
    const call = tracker(complete, client);
    return (text, model, options = {}) =>
        call('translation', { model, system: TRANSLATOR_SYSTEM, user: translatorUserPrompt(text), json: true }, options, parseSpecReply);
}

export function createInterpreter(complete: CompletionFn, client: LlmClientOptions = {}): Interpreter {
    const call = tracker(complete, client);
    return (text, spec, model, options = {}) =>
        call('interpretation', { model, system: INTERPRETER_SYSTEM, user: interpreterUserPrompt(text, spec), json: false }, options, asText);
}

export function createExplainer(complete: CompletionFn, client: LlmClientOptions = {}): Explainer {
    const call = tracker(complete, client);
    return (spec, metrics, model, options = {}) =>
        call('explanation', { model, system: EXPLAINER_SYSTEM, user: explainerUserPrompt(spec, metrics), json: false }, options, asText);
}
