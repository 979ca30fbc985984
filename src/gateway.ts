/**
 * This module is the single point of contact with the language model. Every call goes through
 * {@link LlmGateway.evaluate}, which consults the cache, builds the prompt, validates the reply
 * and reports the outcome as a tagged {@link GatewayResult}.
 */
import OpenAI from 'openai';
import z from 'zod';
import { cacheKey, type CacheStore } from './cache.js';
import { InvalidModelOutputError } from './errors.js';
import { safeCall } from './helpers.js';
import { promptBuilder } from './instructions/promptBuilder.js';
import { MODEL_OUTPUT_SCHEMAS, type ModelCallKind, type ModelOutput } from './schemas.js';
import type { DegreeLevel, ResumeProfile, RetryOptions } from './types.js';

export interface ModelInputs {
    profile: { resumeText: string };
    degree_gate: { degreeLevel: DegreeLevel; title: string; company: string; description: string };
    job_evaluation: {
        profile: ResumeProfile;
        posting: { title: string; company: string; location: string; description: string; url: string };
    };
}

export interface ModelRequest {
    kind: ModelCallKind;
    instructions: string;
    input: string;
}

/**
 * Request/response text generation. Implementations throw on transport failures and return the raw reply text otherwise.
 */
export interface ModelClient {
    complete(request: ModelRequest): Promise<string>;
}

export class OpenAIModelClient implements ModelClient {
    private openai: OpenAI;
    private model: string;
    private temperature: number | undefined;

    constructor({ apiKey, model, timeoutMs, temperature }: { apiKey: string; model: string; timeoutMs: number; temperature?: number }) {
        // retries are handled by safeCall in the gateway
        this.openai = new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });
        this.model = model;
        this.temperature = temperature;
    }

    async complete({ instructions, input }: ModelRequest): Promise<string> {
        const completion = await this.openai.chat.completions.create({
            model: this.model,
            messages: [
                { role: 'system', content: instructions },
                { role: 'user', content: input }
            ],
            ...(this.temperature === undefined ? {} : { temperature: this.temperature })
        });
        return completion.choices[0]?.message?.content ?? '';
    }
}

export type GatewayResult<K extends ModelCallKind> =
    | { status: 'ok'; kind: K; key: string; cached: boolean; value: ModelOutput<K> }
    | { status: 'invalid'; kind: K; key: string; issues: string[] }
    | { status: 'failed'; kind: K; key: string; error: Error };

export interface GatewayStats {
    modelCalls: number;
    cacheHits: number;
    invalidResponses: number;
    failures: number;
}

export interface GatewayOptions {
    promptVersion: string;
    /**
     * Values substituted into every instructions template. They are hashed into the cache key.
     */
    placeholders?: Array<[string, string]>;
    /**
     * Length to which long strings in the input are cut when the service reports the request as too large.
     */
    descriptionTrim?: number;
    retry?: Omit<RetryOptions<string>, 'onRequestTooLarge'>;
    instructionsDir?: string;
}

function parseOutput<K extends ModelCallKind>(kind: K, raw: unknown): z.SafeParseReturnType<unknown, ModelOutput<K>> {
    return MODEL_OUTPUT_SCHEMAS[kind].safeParse(raw);
}

/**
 * Pulls the JSON object out of a model reply, tolerating markdown fences and prose around it.
 */
export function extractJsonObject(kind: ModelCallKind, text: string): unknown {
    const unfenced = text.replace(/```(?:json)?/gi, '');
    const start = unfenced.indexOf('{');
    const end = unfenced.lastIndexOf('}');
    if (start === -1 || end < start) throw new InvalidModelOutputError(kind, ['reply contains no JSON object']);
    try {
        return JSON.parse(unfenced.slice(start, end + 1));
    } catch (err) {
        throw new InvalidModelOutputError(kind, [`reply is not valid JSON: ${err instanceof Error ? err.message : String(err)}`]);
    }
}

export function truncateStrings(value: unknown, maxChars: number): unknown {
    if (typeof value === 'string') return value.length > maxChars ? value.slice(0, maxChars) : value;
    if (Array.isArray(value)) return value.map(v => truncateStrings(v, maxChars));
    if (value && typeof value === 'object') return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, truncateStrings(v, maxChars)]));
    return value;
}

export class LlmGateway {
    private client: ModelClient;
    private cache: CacheStore;
    private options: GatewayOptions;
    stats: GatewayStats = { modelCalls: 0, cacheHits: 0, invalidResponses: 0, failures: 0 };

    constructor(client: ModelClient, cache: CacheStore, options: GatewayOptions) {
        this.client = client;
        this.cache = cache;
        this.options = options;
    }

    get promptVersion() {
        return this.options.promptVersion;
    }

    keyFor<K extends ModelCallKind>(kind: K, payload: ModelInputs[K]): string {
        const placeholders = this.options.placeholders ?? [];
        return cacheKey(this.options.promptVersion, kind, placeholders.length ? { payload, placeholders } : payload);
    }

    async evaluate<K extends ModelCallKind>(kind: K, payload: ModelInputs[K]): Promise<GatewayResult<K>> {
        const key = this.keyFor(kind, payload);
        let cached: unknown;
        try {
            cached = await this.cache.get(key);
        } catch (err) {
            console.warn(`[gateway] could not read ${kind} entry ${key.slice(0, 12)} from the cache:`, err instanceof Error ? err.message : err);
        }
        if (cached !== undefined) {
            const parsed = parseOutput(kind, cached);
            if (parsed.success) {
                this.stats.cacheHits++;
                return { status: 'ok', kind, key, cached: true, value: parsed.data };
            }
            console.warn(`[gateway] cached ${kind} entry ${key.slice(0, 12)} no longer matches its schema; calling the model again.`);
        }

        const instructions = promptBuilder(kind, this.options.placeholders, this.options.instructionsDir);
        const send = (input: unknown) => {
            this.stats.modelCalls++;
            return this.client.complete({ kind, instructions, input: JSON.stringify(input) });
        };
        let reply: string;
        try {
            reply = await safeCall(`${kind}(${key.slice(0, 12)})`, () => send(payload), {
                retries: 3,
                ...this.options.retry,
                onRequestTooLarge: () => send(truncateStrings(payload, this.options.descriptionTrim ?? 6000))
            });
        } catch (err) {
            this.stats.failures++;
            return { status: 'failed', kind, key, error: err instanceof Error ? err : new Error(String(err)) };
        }

        let raw: unknown;
        try {
            raw = extractJsonObject(kind, reply);
        } catch (err) {
            this.stats.invalidResponses++;
            const issues = err instanceof InvalidModelOutputError ? err.issues : [String(err)];
            console.warn(`[gateway] ${kind} reply rejected: ${issues.join('; ')}`);
            return { status: 'invalid', kind, key, issues };
        }
        const parsed = parseOutput(kind, raw);
        if (!parsed.success) {
            this.stats.invalidResponses++;
            const { issues } = InvalidModelOutputError.fromZod(kind, parsed.error);
            console.warn(`[gateway] ${kind} reply rejected: ${issues.join('; ')}`);
            return { status: 'invalid', kind, key, issues };
        }
        try {
            await this.cache.put(key, parsed.data, { kind, promptVersion: this.options.promptVersion });
        } catch (err) {
            console.warn(`[gateway] could not cache ${kind} entry ${key.slice(0, 12)}:`, err);
        }
        return { status: 'ok', kind, key, cached: false, value: parsed.data };
    }
}
