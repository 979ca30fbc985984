import OpenAI from 'openai';
import axios from 'axios';
import crypto from 'crypto';
import fs from 'fs';
import type { RetryOptions } from './types.js';

export function normalizeWhitespace(input: string) {
    return input
        .replace(/\r/g, '')
        .replace(/ {2,}/g, ' ')
        .replace(/[ \t]+\n/g, '\n')
        .replace(/\n{2,}/g, '\n\n')
        .trim();
}

export const sha256 = (s: string) => crypto.createHash('sha256').update(s, 'utf8').digest('hex');

/**
 * JSON serialisation with sorted object keys, so that equal values always produce equal strings.
 */
export function stableStringify(value: unknown): string {
    if (Array.isArray(value)) return `[${value.map(v => v === undefined ? 'null' : stableStringify(v)).join(',')}]`;
    if (value && typeof value === 'object') {
        return `{${Object.keys(value)
            .sort()
            .flatMap(k => {
                const v: unknown = Reflect.get(value, k);
                return v === undefined ? [] : [`${JSON.stringify(k)}:${stableStringify(v)}`];
            })
            .join(',')}}`;
    }
    return JSON.stringify(value) ?? 'null';
}

const DEFAULT_RETRYABLE_STATUS = (status: number | null) => status === 429 || status === null || (status >= 500 && status < 600);

function headerValue(headers: unknown, name: string): string | null {
    if (!headers || typeof headers !== 'object') return null;
    if (headers instanceof Headers) return headers.get(name);
    for (const [k, v] of Object.entries(headers)) {
        if (k.toLowerCase() === name && (typeof v === 'string' || typeof v === 'number')) return String(v);
    }
    return null;
}

function errorStatus(err: unknown): number | null {
    if (err instanceof OpenAI.APIError) return err.status ?? null;
    if (axios.isAxiosError(err)) return err.response?.status ?? null;
    return null;
}

function errorHeaders(err: unknown): unknown {
    if (err instanceof OpenAI.APIError) return err.headers;
    if (axios.isAxiosError(err)) return err.response?.headers;
    return null;
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export function extractSuggestedDelayMs(err: unknown): number | null {
    const retryAfter = headerValue(errorHeaders(err), 'retry-after');
    if (retryAfter) {
        const asNumber = Number(retryAfter);
        if (!Number.isNaN(asNumber)) {
            return asNumber * 1000; //if header.retry-after is in seconds, return milliseconds
        }
        const dateMs = Date.parse(retryAfter);
        if (!Number.isNaN(dateMs)) {
            const delta = dateMs - Date.now();
            if (delta > 0) return delta; //if date is in the future, return milliseconds until that date
        }
    }
    const retrymatch = errorMessage(err).match(/try again in (?:(\d{1,4})ms|(\d+)(?:\.(\d+))?s)/i);
    if (retrymatch) {
        const [, ms, s, frac] = retrymatch;
        if (ms) return Number(ms);
        if (s) return Number(`${s}.${frac ?? 0}`) * 1000;
    }
    return null;
}

/**
 * Runs `fn`, retrying transient failures (rate limits, 5xx, network errors) with exponential backoff and jitter.
 * A server-suggested delay (`retry-after` header or "try again in" message) takes precedence over the backoff.
 */
export async function safeCall<T>(context: string, fn: () => Promise<T>, opts: RetryOptions<T> = {}): Promise<T> {
    const {
        retries = 5,
        baseDelayMs = 600,
        maxDelayMs = 8000,
        jitterRatio = 0.4,
        retryOn = ({ status }) => DEFAULT_RETRYABLE_STATUS(status),
        onRequestTooLarge
    } = opts;
    let attempt = 0;
    while (true) {
        try {
            return await fn();
        } catch (err) {
            const status = errorStatus(err);
            const message = errorMessage(err);
            if (/request too large/i.test(message)) {
                if (onRequestTooLarge) {
                    console.warn(`[safeCall] ${context} request too large; invoking onRequestTooLarge handler.`);
                    return await onRequestTooLarge();
                }
                console.error(`[safeCall] ${context} request too large but no onRequestTooLarge handler provided.`);
                throw err;
            }
            if (!(attempt < retries && retryOn({ status, error: err, attempt }))) {
                console.error(`[safeCall] ${context} failed (final):`, { status, message });
                throw err;
            }
            let delayMs = extractSuggestedDelayMs(err);
            let reason = 'server-suggested';
            if (delayMs === null) {
                reason = status === 429 ? 'rate-limit' : (status && status >= 500 ? 'server-error' : 'network/unknown');
                delayMs = Math.min(maxDelayMs, baseDelayMs * (2 ** attempt));
            }
            const jitterRange = delayMs * jitterRatio;
            delayMs += Math.max(0, Math.round((Math.random() * jitterRange * 2) - jitterRange));
            console.warn(`[safeCall] ${context} failed (attempt ${attempt + 1} of ${retries}, ${reason}), retrying in ${delayMs}ms:`, { status, message });
            await sleep(delayMs);
            attempt++;
        }
    }
}

export const readJSON = <T>(p: string, options: { encoding: BufferEncoding, flag?: string | undefined } | BufferEncoding = 'utf8'): T => JSON.parse(fs.readFileSync(p, options));

export function sleep(ms: number) { return new Promise(r => setTimeout(r, ms)); }

export function deepFreeze<T>(value: T): T {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
        for (const v of Object.values(value)) deepFreeze(v);
        Object.freeze(value);
    }
    return value;
}
